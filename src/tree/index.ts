/**
 * Partial tree exports, shared and per source kind.
 */

export * from './types.js';
export * from './expression.js';
export * from './conversions.js';
export * from './Property.js';
export * from './TreeNode.js';
export * from './PartialTree.js';

export * from './hardware/raw.js';
export * from './hardware/cells.js';
export * from './hardware/address.js';
export * from './hardware/phandle.js';
export * from './hardware/conversions.js';
export * from './hardware/HardwareNode.js';
export * from './hardware/HardwareTree.js';

export * from './software/overlays.js';
export * from './software/conversions.js';
export * from './software/ConfigNode.js';
export * from './software/ConfigTree.js';
