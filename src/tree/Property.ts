/**
 * Property — a resolved, validated property on a node.
 *
 * Most accessors forward to the PropertySpec the value was resolved against.
 */

import { isDeepStrictEqual } from 'node:util';
import { PropertyError } from '../errors.js';
import { strAsToken } from '../identifiers.js';
import type { PropertySpec } from '../binding/PropertySpec.js';
import type { ValueKind } from '../binding/types.js';
import type { TypedValue } from './types.js';

export class Property {
  constructor(
    readonly spec: PropertySpec,
    /** Path of the node the property is on */
    readonly nodePath: string,
    readonly typed: TypedValue,
  ) {}

  get name(): string {
    return this.spec.name;
  }

  /** The binding `type:` string */
  get type(): string {
    return this.spec.type;
  }

  get kind(): ValueKind {
    return this.typed.kind;
  }

  get value(): TypedValue['value'] {
    return this.typed.value;
  }

  /** Description from the binding, trimmed */
  get description(): string | undefined {
    return this.spec.description?.trim();
  }

  /**
   * Scalar sub-values: the elements of a list value, or the value itself.
   */
  get subValues(): readonly unknown[] {
    const value = this.typed.value;
    return Array.isArray(value) ? value : [value];
  }

  /**
   * The value as tokens. Only meaningful for string and string-array values.
   */
  get valueAsTokens(): string[] {
    return this.subValues.map(sub => {
      if (typeof sub !== 'string') {
        throw new PropertyError(`'${this.name}' has non-string value, cannot convert to tokens`, this.nodePath);
      }
      return strAsToken(sub);
    });
  }

  /**
   * Indices of the sub-values in the spec's enum, or undefined without an enum.
   */
  get enumIndices(): number[] | undefined {
    const values = this.spec.enum;
    if (values === undefined || values.length === 0) {
      return undefined;
    }
    return this.subValues.map(sub => values.findIndex(candidate => isDeepStrictEqual(candidate, sub)));
  }

  toString(): string {
    return `<Property '${this.name}' at '${this.nodePath}' in '${this.spec.path}'>`;
  }
}
