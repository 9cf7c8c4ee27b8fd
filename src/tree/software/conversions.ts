/**
 * Conversion table for configuration property values.
 *
 * Integers may be given as numbers or as integer expressions; sized integer
 * types are range checked. Pointers resolve to node paths through the
 * owning tree.
 */

import { PropertyError } from '../../errors.js';
import { isInteger, isNumberList, isStringList, parseHexBytes } from '../../binding/values.js';
import { describeValue, unsupported, type ConversionTable } from '../conversions.js';
import { EXPRESSION_CHARS, evaluateIntegerExpression } from '../expression.js';
import type { PropertySpec } from '../../binding/PropertySpec.js';
import type { NodeRef } from '../types.js';
import type { ConfigNode } from './ConfigNode.js';

function mismatch(raw: unknown, spec: PropertySpec, node: ConfigNode, expected: string): never {
  throw new PropertyError(
    `expected property '${spec.name}' in ${node.sourcePath} to be ${expected}, not ${describeValue(raw)}`,
    node.path,
  );
}

/**
 * Inclusive bounds of a sized integer type.
 */
function rangeOf(bits: number, signed: boolean): [bigint, bigint] {
  const width = BigInt(bits);
  return signed ? [-(1n << (width - 1n)), (1n << (width - 1n)) - 1n] : [0n, (1n << width) - 1n];
}

function toInteger(raw: unknown, spec: PropertySpec, node: ConfigNode): number {
  let value: number;
  if (isInteger(raw)) {
    value = raw;
  } else if (typeof raw === 'string' && EXPRESSION_CHARS.test(raw)) {
    try {
      value = evaluateIntegerExpression(raw);
    } catch (err) {
      throw new PropertyError(
        `expected property '${spec.name}' to be an integer expression: ${err instanceof Error ? err.message : String(err)}`,
        node.path,
      );
    }
  } else {
    return mismatch(raw, spec, node, 'an integer');
  }

  const { bits, signed } = spec.typeInfo;
  if (bits !== undefined) {
    const [min, max] = rangeOf(bits, signed ?? true);
    if (BigInt(value) < min || BigInt(value) > max) {
      throw new PropertyError(
        `value of property '${spec.name}' (${value}) is out of range for type '${spec.type}' (${min} to ${max})`,
        node.path,
      );
    }
  } else if (!Number.isSafeInteger(value)) {
    throw new PropertyError(`value of property '${spec.name}' (${value}) is not a safe integer`, node.path);
  }
  return value;
}

function toByte(raw: unknown, spec: PropertySpec, node: ConfigNode): number {
  if (!isInteger(raw) || raw < 0 || raw > 0xff) {
    return mismatch(raw, spec, node, 'a byte (0 to 255)');
  }
  return raw;
}

function toPointer(raw: unknown, spec: PropertySpec, node: ConfigNode): NodeRef {
  if (typeof raw !== 'string') {
    return mismatch(raw, spec, node, "'&foo', 'foo' or '/bar/foo'");
  }
  return { path: node.resolvePointer(raw, spec.name) };
}

export const configConversions: ConversionTable<unknown, ConfigNode> = {
  boolean: (raw, spec, node) => {
    if (typeof raw !== 'boolean') {
      return mismatch(raw, spec, node, 'a boolean');
    }
    return { kind: 'boolean', value: raw };
  },

  integer: (raw, spec, node) => ({ kind: 'integer', value: toInteger(raw, spec, node) }),

  'integer-array': (raw, spec, node) => {
    if (!Array.isArray(raw)) {
      return mismatch(raw, spec, node, 'a list of integers');
    }
    const items: readonly unknown[] = raw;
    return { kind: 'integer-array', value: items.map(item => toInteger(item, spec, node)) };
  },

  'byte-array': (raw, spec, node) => {
    if (typeof raw === 'string') {
      const bytes = parseHexBytes(raw);
      if (bytes === undefined) {
        throw new PropertyError(
          `value of property '${spec.name}' (${describeValue(raw)}) in ${node.sourcePath} is not a valid hex number`,
          node.path,
        );
      }
      return { kind: 'byte-array', value: bytes };
    }
    if (Array.isArray(raw)) {
      const items: readonly unknown[] = raw;
      return { kind: 'byte-array', value: Uint8Array.from(items.map(item => toByte(item, spec, node))) };
    }
    return { kind: 'byte-array', value: Uint8Array.of(toByte(raw, spec, node)) };
  },

  string: (raw, spec, node) => {
    if (typeof raw !== 'string') {
      return mismatch(raw, spec, node, 'a string');
    }
    return { kind: 'string', value: raw };
  },

  'string-array': (raw, spec, node) => {
    if (!isStringList(raw)) {
      return mismatch(raw, spec, node, 'a list of strings');
    }
    return { kind: 'string-array', value: [...raw] };
  },

  float: (raw, spec, node) => {
    if (typeof raw !== 'number') {
      return mismatch(raw, spec, node, 'a float');
    }
    return { kind: 'float', value: raw };
  },

  'float-array': (raw, spec, node) => {
    if (!isNumberList(raw)) {
      return mismatch(raw, spec, node, 'a list of floats');
    }
    return { kind: 'float-array', value: [...raw] };
  },

  'node-reference': (raw, spec, node) => ({ kind: 'node-reference', value: toPointer(raw, spec, node) }),

  'node-reference-list': (raw, spec, node) => {
    if (!isStringList(raw)) {
      return mismatch(raw, spec, node, 'a list of pointers');
    }
    if (raw.some(p => p.startsWith('&')) && raw.some(p => p.startsWith('/'))) {
      throw new PropertyError(`pointer list '${spec.name}' mixes '&label' and '/path' forms`, node.path);
    }
    return { kind: 'node-reference-list', value: raw.map(pointer => toPointer(pointer, spec, node)) };
  },

  'indexed-reference-list': unsupported('software'),
  path: unsupported('software'),
  opaque: unsupported('software'),
};
