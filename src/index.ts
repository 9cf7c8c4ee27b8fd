/**
 * settings-tree — schema-validated settings merged from a hardware
 * description and a software configuration.
 *
 * This is the main entry point for the library.
 */

// Errors and diagnostics
export * from './errors.js';
export * from './logging/logger.js';
export * from './logging/diagnostics.js';

// Options and build configuration
export * from './config/options.js';
export * from './config/types.js';
export * from './config/loader.js';

// Bindings
export * from './binding/index.js';

// Partial trees
export * from './tree/index.js';

// Dependency graph
export * from './graph/DependencyGraph.js';

// Merged tree
export * from './merge/index.js';

// Identifiers
export * from './identifiers.js';

// Pipeline
export * from './build.js';
