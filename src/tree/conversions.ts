/**
 * Conversion tables — raw source values to typed property values.
 *
 * Each source kind supplies one table indexed by value kind. The shared
 * helpers here cover defaults, which come from bindings and look the same
 * for every source.
 */

import { PropertyError, SchemaError } from '../errors.js';
import { isByteList, isInteger, isIntegerList, isNumberList, isStringList, parseHexBytes } from '../binding/values.js';
import type { PropertySpec } from '../binding/PropertySpec.js';
import type { ValueKind } from '../binding/types.js';
import type { TypedValue } from './types.js';

/**
 * Value kinds a property can be converted to. Child nodes are not properties.
 */
export type ConvertibleKind = Exclude<ValueKind, 'child-node'>;

/**
 * Converts the raw value of a present property. Returns undefined when the
 * kind yields no property value (opaque types).
 */
export type Converter<R, N> = (raw: R, spec: PropertySpec, node: N) => TypedValue | undefined;

export type ConversionTable<R, N> = Record<ConvertibleKind, Converter<R, N>>;

/**
 * Render a value for error messages.
 */
export function describeValue(value: unknown): string {
  if (value instanceof Uint8Array) {
    return `[${Array.from(value, b => b.toString(16).padStart(2, '0')).join(' ')}]`;
  }
  if (typeof value === 'string') {
    return `'${value}'`;
  }
  return JSON.stringify(value) ?? String(value);
}

/**
 * Converter for kinds a source does not support. Bindings of that source
 * never declare such types, so reaching it is a bug in the caller.
 */
export function unsupported<R, N>(sourceKind: string): Converter<R, N> {
  return (_raw, spec) => {
    throw new PropertyError(`'${spec.name}' has type '${spec.type}', which ${sourceKind} sources do not support`);
  };
}

/**
 * The typed value of a spec's `default:`, or undefined without one.
 */
export function defaultValue(spec: PropertySpec): TypedValue | undefined {
  if (!spec.hasDefault) {
    return undefined;
  }
  const value = spec.default;
  switch (spec.kind) {
    case 'boolean':
      if (typeof value === 'boolean') {
        return { kind: 'boolean', value };
      }
      break;
    case 'integer':
      if (isInteger(value)) {
        return { kind: 'integer', value };
      }
      break;
    case 'integer-array':
      if (isIntegerList(value)) {
        return { kind: 'integer-array', value: [...value] };
      }
      break;
    case 'byte-array': {
      const bytes = isByteList(value)
        ? Uint8Array.from(value)
        : typeof value === 'string'
          ? parseHexBytes(value)
          : undefined;
      if (bytes !== undefined) {
        return { kind: 'byte-array', value: bytes };
      }
      break;
    }
    case 'string':
      if (typeof value === 'string') {
        return { kind: 'string', value };
      }
      break;
    case 'string-array':
      if (isStringList(value)) {
        return { kind: 'string-array', value: [...value] };
      }
      break;
    case 'float':
      if (typeof value === 'number') {
        return { kind: 'float', value };
      }
      break;
    case 'float-array':
      if (isNumberList(value)) {
        return { kind: 'float-array', value: [...value] };
      }
      break;
    default:
      break;
  }
  throw new SchemaError(`'default: ${describeValue(value)}' is invalid for '${spec.name}' of type ${spec.type}`, spec.path);
}

/**
 * Whether a resolved value equals a spec's `const:`. Byte arrays compare
 * against either const form.
 */
export function matchesConst(value: TypedValue['value'], constant: unknown): boolean {
  if (value instanceof Uint8Array) {
    const expected = isIntegerList(constant)
      ? constant
      : typeof constant === 'string'
        ? Array.from(parseHexBytes(constant) ?? [])
        : undefined;
    return expected !== undefined && expected.length === value.length && expected.every((b, i) => b === value[i]);
  }
  if (Array.isArray(value) || Array.isArray(constant)) {
    if (!Array.isArray(value) || !Array.isArray(constant)) {
      return false;
    }
    const items: readonly unknown[] = value;
    return items.length === constant.length && items.every((v, i) => v === constant[i]);
  }
  return value === constant;
}
