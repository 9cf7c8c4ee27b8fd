/**
 * Merged tree exports.
 */

export * from './vendor-prefixes.js';
export * from './MergedEntity.js';
export * from './SettingsTree.js';
