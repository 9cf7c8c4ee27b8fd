/**
 * Shape checks shared by binding validation and property resolution.
 */

import type { ValueKind, YamlMap } from './types.js';

export function isYamlMap(value: unknown): value is YamlMap {
  return value !== null && typeof value === 'object' && !Array.isArray(value) && !(value instanceof Uint8Array);
}

export function isInteger(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value);
}

export function isIntegerList(value: unknown): value is number[] {
  return Array.isArray(value) && value.every(isInteger);
}

export function isByteList(value: unknown): value is number[] {
  return isIntegerList(value) && value.every(v => v >= 0 && v <= 0xff);
}

export function isStringList(value: unknown): value is string[] {
  return Array.isArray(value) && value.every(v => typeof v === 'string');
}

export function isNumberList(value: unknown): value is number[] {
  return Array.isArray(value) && value.every(v => typeof v === 'number');
}

const HEX_BYTES = /^(?:\s*[0-9a-fA-F]{2})*\s*$/;

/**
 * Parse a hex string such as "0a0b" or "0a 0b" into bytes.
 */
export function parseHexBytes(text: string): Uint8Array | undefined {
  if (!HEX_BYTES.test(text)) {
    return undefined;
  }
  const digits = text.replace(/\s+/g, '');
  const bytes = new Uint8Array(digits.length / 2);
  for (let i = 0; i < bytes.length; i++) {
    bytes[i] = parseInt(digits.slice(i * 2, i * 2 + 2), 16);
  }
  return bytes;
}

/**
 * Whether `value` is an acceptable `default:` for a property of `kind`.
 */
export function isValidDefault(kind: ValueKind, value: unknown): boolean {
  switch (kind) {
    case 'boolean':
      return typeof value === 'boolean';
    case 'integer':
      return isInteger(value);
    case 'integer-array':
      return isIntegerList(value);
    case 'byte-array':
      return isByteList(value) || (typeof value === 'string' && parseHexBytes(value) !== undefined);
    case 'string':
      return typeof value === 'string';
    case 'string-array':
      return isStringList(value);
    case 'float':
      return typeof value === 'number';
    case 'float-array':
      return isNumberList(value);
    default:
      return false;
  }
}
