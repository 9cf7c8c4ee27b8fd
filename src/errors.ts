/**
 * Error classes for settings-tree.
 *
 * Every failure raised while resolving bindings, building partial trees or
 * merging them derives from SettingsError. All of them are fatal: processing
 * stops and no partial result is exposed.
 */

/**
 * Error codes for categorizing errors.
 */
export enum ErrorCode {
  SCHEMA = 'E1000',
  PROPERTY = 'E2000',
  SOURCE = 'E3000',
  MERGE = 'E4000',
  GRAPH = 'E5000',
  STATE = 'E6000',
}

/**
 * Base error class for all settings-tree errors.
 */
export class SettingsError extends Error {
  public readonly code: ErrorCode;
  public readonly context?: Record<string, unknown>;

  constructor(code: ErrorCode, message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = 'SettingsError';
    this.code = code;
    this.context = context;
  }
}

/**
 * Malformed binding document, bad include filter, duplicate schema+variant.
 */
export class SchemaError extends SettingsError {
  constructor(message: string, public readonly bindingPath?: string) {
    super(ErrorCode.SCHEMA, bindingPath ? `${bindingPath}: ${message}` : message, { bindingPath });
    this.name = 'SchemaError';
  }
}

/**
 * Property value that violates its spec, or cannot be resolved.
 */
export class PropertyError extends SettingsError {
  constructor(message: string, public readonly nodePath?: string) {
    super(ErrorCode.PROPERTY, nodePath ? `${nodePath}: ${message}` : message, { nodePath });
    this.name = 'PropertyError';
  }
}

/**
 * Raw source data that is malformed before any binding applies.
 */
export class SourceError extends SettingsError {
  constructor(message: string, public readonly nodePath?: string) {
    super(ErrorCode.SOURCE, nodePath ? `${nodePath}: ${message}` : message, { nodePath });
    this.name = 'SourceError';
  }
}

/**
 * Conflicting contributions from two sources at the same path.
 */
export class MergeError extends SettingsError {
  constructor(message: string, public readonly nodePath: string) {
    super(ErrorCode.MERGE, `${nodePath}: ${message}`, { nodePath });
    this.name = 'MergeError';
  }
}

/**
 * Dependency cycle, or a graph without roots.
 */
export class GraphError extends SettingsError {
  constructor(message: string, public readonly members: string[] = []) {
    super(ErrorCode.GRAPH, message, { members });
    this.name = 'GraphError';
  }
}

/**
 * API used out of order.
 */
export class StateError extends SettingsError {
  constructor(message: string) {
    super(ErrorCode.STATE, message);
    this.name = 'StateError';
  }
}
