/**
 * PropertySpec — the declaration of one property in a binding.
 *
 * Specs are built from validated declarations and never change afterwards.
 */

import type { PropertyTypeInfo, ValueKind } from './types.js';

const NOT_ALPHANUM_OR_UNDERSCORE = /[^A-Za-z0-9_]/g;

/**
 * Constructor input for a PropertySpec.
 */
export interface PropertySpecInit {
  /** Property name, or name pattern */
  name: string;
  /** File where the property was last defined */
  path: string;
  /** The `type:` string as written in the binding */
  type: string;
  typeInfo: PropertyTypeInfo;
  description?: string;
  enum?: readonly unknown[];
  const?: unknown;
  default?: unknown;
  required?: boolean;
  deprecated?: boolean;
  specifierSpace?: string;
}

export class PropertySpec {
  readonly name: string;
  readonly path: string;
  readonly type: string;
  readonly typeInfo: PropertyTypeInfo;
  readonly description: string | undefined;
  readonly enum: readonly unknown[] | undefined;
  readonly const: unknown;
  readonly default: unknown;
  readonly required: boolean;
  readonly deprecated: boolean;
  readonly specifierSpace: string | undefined;

  private tokens?: string[];

  constructor(init: PropertySpecInit) {
    this.name = init.name;
    this.path = init.path;
    this.type = init.type;
    this.typeInfo = init.typeInfo;
    this.description = init.description;
    this.enum = init.enum === undefined ? undefined : Object.freeze([...init.enum]);
    this.const = init.const;
    this.default = init.default;
    this.required = init.required ?? false;
    this.deprecated = init.deprecated ?? false;
    this.specifierSpace = init.specifierSpace;
  }

  get kind(): ValueKind {
    return this.typeInfo.kind;
  }

  get hasDefault(): boolean {
    return this.default !== undefined && this.default !== null;
  }

  get hasConst(): boolean {
    return this.const !== undefined && this.const !== null;
  }

  /**
   * Enum values with every non-alphanumeric character replaced by `_`, or
   * undefined when the property is not a string enum.
   */
  get enumTokens(): readonly string[] | undefined {
    if (this.tokens === undefined) {
      if ((this.type !== 'string' && this.type !== 'string-array') || this.enum === undefined) {
        return undefined;
      }
      const values = this.enum;
      if (!values.every((v): v is string => typeof v === 'string')) {
        return undefined;
      }
      this.tokens = values.map(v => v.replace(NOT_ALPHANUM_OR_UNDERSCORE, '_'));
    }
    return this.tokens;
  }

  /**
   * True if the enum values stay unique once converted to tokens.
   */
  get enumTokenizable(): boolean {
    const tokens = this.enumTokens;
    return tokens !== undefined && new Set(tokens).size === tokens.length;
  }

  /**
   * Like enumTokenizable, and the tokens also stay unique when uppercased.
   */
  get enumUpperTokenizable(): boolean {
    const tokens = this.enumTokens;
    return this.enumTokenizable && tokens !== undefined && new Set(tokens.map(t => t.toUpperCase())).size === tokens.length;
  }

  toString(): string {
    return `<PropertySpec ${this.name} type '${this.type}' in '${this.path}'>`;
  }
}
