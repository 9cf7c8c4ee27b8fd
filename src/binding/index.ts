/**
 * Binding module exports.
 */

export * from './types.js';
export * from './values.js';
export * from './pattern.js';
export * from './filter.js';
export * from './merge.js';
export * from './dialects.js';
export * from './PropertySpec.js';
export * from './Binding.js';
export * from './BindingCatalog.js';
