/**
 * Types for binding documents and property specifications.
 *
 * A binding describes the allowed shape of nodes declaring a matching schema
 * identifier. Bindings are written in YAML; the types here describe the
 * parsed documents and the closed set of property types.
 */

/**
 * A parsed YAML mapping.
 */
export type YamlMap = Record<string, unknown>;

/**
 * Value concept a property type resolves to.
 */
export type ValueKind =
  | 'boolean'
  | 'integer'
  | 'integer-array'
  | 'byte-array'
  | 'string'
  | 'string-array'
  | 'float'
  | 'float-array'
  | 'node-reference'
  | 'node-reference-list'
  | 'indexed-reference-list'
  | 'path'
  | 'opaque'
  | 'child-node';

/**
 * Static information about one binding `type:` value.
 */
export interface PropertyTypeInfo {
  kind: ValueKind;
  /** Whether `default:` may be given */
  defaultAllowed: boolean;
  /** Bit width of sized integer types */
  bits?: 8 | 16 | 32 | 64;
  /** Signedness of sized integer types */
  signed?: boolean;
}

/**
 * Source kinds a binding can be written for.
 */
export type SourceKind = 'hardware' | 'software';

/**
 * Property filter of an `include:` entry, possibly nested for child bindings.
 */
export interface PropertyFilter {
  allowlist?: string[];
  blocklist?: string[];
  /** Filter applied to the properties of child bindings */
  child?: PropertyFilter;
}

/**
 * Resolves an include name to the path and text of a binding document.
 */
export interface IncludeResolver {
  resolve(name: string): { path: string; source: string } | undefined;
}

/**
 * Source-kind specific rules for binding documents.
 */
export interface BindingDialect {
  readonly kind: SourceKind;
  /** Top-level key holding the schema identifier of `doc` */
  schemaKey(doc: YamlMap): string;
  /** Keys an including document may change silently */
  readonly overridableKeys: ReadonlySet<string>;
  /** Closed set of `type:` values */
  readonly propertyTypes: Readonly<Record<string, PropertyTypeInfo>>;
  /** Keys allowed on a property declaration */
  readonly propertyKeys: ReadonlySet<string>;
  /** Top-level keys allowed besides the schema key, description and properties */
  readonly topLevelKeys: ReadonlySet<string>;
  /** Legacy top-level keys and the hint given when they are found */
  readonly legacyKeys: Readonly<Record<string, string>>;
  /** Extra top-level document checks */
  checkDocument(doc: YamlMap, path: string): void;
  /** Extra per-property checks */
  checkProperty(name: string, decl: YamlMap, path: string): void;
}
