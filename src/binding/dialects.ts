/**
 * Binding dialects for the two source kinds.
 *
 * Hardware bindings may name their schema with `compatible`, describe buses
 * and specifier cells, and declare reference types resolved through phandles.
 * Software bindings add pointers, floats and sized integers.
 */

import { SchemaError } from '../errors.js';
import { OVERRIDABLE_KEYS } from './merge.js';
import { isStringList } from './values.js';
import type { BindingDialect, PropertyTypeInfo, YamlMap } from './types.js';

const COMMON_TYPES: Record<string, PropertyTypeInfo> = {
  boolean: { kind: 'boolean', defaultAllowed: true },
  int: { kind: 'integer', defaultAllowed: true },
  array: { kind: 'integer-array', defaultAllowed: true },
  'uint8-array': { kind: 'byte-array', defaultAllowed: true },
  string: { kind: 'string', defaultAllowed: true },
  'string-array': { kind: 'string-array', defaultAllowed: true },
  node: { kind: 'child-node', defaultAllowed: false },
};

const HARDWARE_TYPES: Record<string, PropertyTypeInfo> = {
  ...COMMON_TYPES,
  boolean: { kind: 'boolean', defaultAllowed: false },
  path: { kind: 'path', defaultAllowed: false },
  phandle: { kind: 'node-reference', defaultAllowed: false },
  phandles: { kind: 'node-reference-list', defaultAllowed: false },
  'phandle-array': { kind: 'indexed-reference-list', defaultAllowed: false },
  compound: { kind: 'opaque', defaultAllowed: false },
};

function sizedIntegerTypes(): Record<string, PropertyTypeInfo> {
  const types: Record<string, PropertyTypeInfo> = {};
  for (const signed of [true, false]) {
    for (const bits of [8, 16, 32, 64] as const) {
      const name = `${signed ? 'int' : 'uint'}${bits}`;
      types[name] = { kind: 'integer', defaultAllowed: true, bits, signed };
      // uint8-array stays a byte array.
      if (name !== 'uint8') {
        types[`${name}-array`] = { kind: 'integer-array', defaultAllowed: true, bits, signed };
      }
    }
  }
  return types;
}

const SOFTWARE_TYPES: Record<string, PropertyTypeInfo> = {
  ...COMMON_TYPES,
  pointer: { kind: 'node-reference', defaultAllowed: false },
  'pointer-array': { kind: 'node-reference-list', defaultAllowed: false },
  float: { kind: 'float', defaultAllowed: true },
  'float-array': { kind: 'float-array', defaultAllowed: true },
  double: { kind: 'float', defaultAllowed: true },
  'double-array': { kind: 'float-array', defaultAllowed: true },
  ...sizedIntegerTypes(),
};

const PROPERTY_KEYS = ['description', 'type', 'required', 'enum', 'const', 'default', 'deprecated'];

const LEGACY_KEYS: Record<string, string> = {
  'sub-node': "use a property with 'type: node' instead",
  title: "use 'description' instead",
};

export const hardwareDialect: BindingDialect = {
  kind: 'hardware',
  schemaKey: (doc: YamlMap) => ('schema' in doc ? 'schema' : 'compatible'),
  overridableKeys: new Set([...OVERRIDABLE_KEYS, 'compatible']),
  propertyTypes: HARDWARE_TYPES,
  propertyKeys: new Set([...PROPERTY_KEYS, 'specifier-space']),
  topLevelKeys: new Set(['bus', 'on-bus']),
  legacyKeys: {
    ...LEGACY_KEYS,
    '#cells': 'expected *-cells syntax',
    child: "use 'bus: <bus>' instead",
    'child-bus': "use 'bus: <bus>' instead",
    parent: "use 'on-bus: <bus>' instead",
    'parent-bus': "use 'on-bus: <bus>' instead",
  },

  checkDocument(doc: YamlMap, path: string): void {
    if ('on-bus' in doc && typeof doc['on-bus'] !== 'string') {
      throw new SchemaError("malformed 'on-bus:' value, expected string", path);
    }
    if ('bus' in doc && typeof doc.bus !== 'string' && !isStringList(doc.bus)) {
      throw new SchemaError("malformed 'bus:' value, expected string or list of strings", path);
    }
    for (const [key, value] of Object.entries(doc)) {
      if (key.endsWith('-cells') && !isStringList(value)) {
        throw new SchemaError(`malformed '${key}:', expected a list of strings`, path);
      }
    }
  },

  checkProperty(name: string, decl: YamlMap, path: string): void {
    const hasSpace = 'specifier-space' in decl;
    if (hasSpace && decl.type !== 'phandle-array') {
      throw new SchemaError(
        `'specifier-space' in 'properties: ${name}' has type '${String(decl.type)}', expected 'phandle-array'`,
        path,
      );
    }
    if (hasSpace && typeof decl['specifier-space'] !== 'string') {
      throw new SchemaError(`malformed 'specifier-space' for '${name}', expected a string`, path);
    }
    if (decl.type === 'phandle-array' && !name.endsWith('s') && !hasSpace) {
      throw new SchemaError(
        `'${name}' in 'properties:' has type 'phandle-array' and its name does not end in 's', ` +
          "but no 'specifier-space' was provided.",
        path,
      );
    }
  },
};

export const softwareDialect: BindingDialect = {
  kind: 'software',
  schemaKey: () => 'schema',
  overridableKeys: OVERRIDABLE_KEYS,
  propertyTypes: SOFTWARE_TYPES,
  propertyKeys: new Set(PROPERTY_KEYS),
  topLevelKeys: new Set(),
  legacyKeys: LEGACY_KEYS,
  checkDocument(): void {
    // No software specific top-level keys.
  },
  checkProperty(): void {
    // No software specific property keys.
  },
};
