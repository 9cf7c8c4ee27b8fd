/**
 * Tests for Binding resolution.
 */

import { describe, it, expect } from 'vitest';
import { stringify } from 'yaml';
import { Binding } from './Binding.js';
import { createBindingCatalog } from './BindingCatalog.js';
import { hardwareDialect, softwareDialect } from './dialects.js';
import { SchemaError } from '../errors.js';
import type { BindingDialect } from './types.js';

// Helper to resolve one file of an in-memory catalog
function resolveFile(
  files: Record<string, object>,
  name: string,
  dialect: BindingDialect = softwareDialect,
): Binding {
  const sources: Record<string, string> = {};
  for (const [path, doc] of Object.entries(files)) {
    sources[path] = stringify(doc);
  }
  const catalog = createBindingCatalog(sources);
  const file = catalog.resolve(name);
  if (file === undefined) {
    throw new Error(`no such test file ${name}`);
  }
  return Binding.resolve(file.source, catalog, { path: file.path, dialect });
}

const base = {
  description: 'Base settings',
  schema: 'vnd,base',
  properties: {
    x: { type: 'int', default: 0 },
    y: { type: 'int', required: true },
  },
};

describe('Binding', () => {
  describe('basic parsing', () => {
    it('reads schema, description and property specs', () => {
      const binding = resolveFile({ 'base.yaml': base }, 'base.yaml');

      expect(binding.schema).toBe('vnd,base');
      expect(binding.description).toBe('Base settings');
      expect([...binding.propertySpecs.keys()]).toEqual(['x', 'y']);
      expect(binding.propertySpecs.get('x')?.default).toBe(0);
      expect(binding.propertySpecs.get('y')?.required).toBe(true);
      expect(binding.propertySpecs.get('y')?.path).toBe('base.yaml');
    });

    it('uses compatible as the schema key of hardware bindings', () => {
      const binding = resolveFile(
        {
          'uart.yaml': {
            description: 'UART on a bus',
            compatible: 'vnd,uart',
            'on-bus': 'spi',
            bus: ['i2c', 'i3c'],
            'gpio-cells': ['pin', 'flags'],
          },
        },
        'uart.yaml',
        hardwareDialect,
      );

      expect(binding.schema).toBe('vnd,uart');
      expect(binding.variant).toBe('spi');
      expect(binding.buses).toEqual(['i2c', 'i3c']);
      expect(binding.specifierCells.get('gpio')).toEqual(['pin', 'flags']);
    });

    it('re-resolves its own serialized form to the same specs', () => {
      const binding = resolveFile(
        {
          'arr.yaml': {
            description: 'Array defaults',
            schema: 'vnd,arr',
            properties: { vals: { type: 'array', default: [1, 2, 3] } },
          },
        },
        'arr.yaml',
      );
      const again = Binding.resolve(binding.toSource(), createBindingCatalog({}), {
        path: 'arr.yaml',
        dialect: softwareDialect,
      });

      expect(again.propertySpecs.get('vals')?.default).toEqual([1, 2, 3]);
      expect(again.document).toEqual(binding.document);
    });
  });

  describe('include', () => {
    it('keeps only allowlisted properties', () => {
      const binding = resolveFile(
        {
          'base.yaml': base,
          'top.yaml': {
            description: 'Top',
            schema: 'vnd,top',
            include: [{ name: 'base.yaml', 'property-allowlist': ['x'] }],
          },
        },
        'top.yaml',
      );

      expect([...binding.propertySpecs.keys()]).toEqual(['x']);
      expect(binding.propertySpecs.get('x')?.path).toBe('base.yaml');
      expect(binding.schema).toBe('vnd,top');
      expect(binding.description).toBe('Top');
    });

    it('promotes a matching pattern to an exact allowlisted entry', () => {
      const binding = resolveFile(
        {
          'names.yaml': {
            description: 'Names',
            properties: { '.*-names': { type: 'string-array' } },
          },
          'top.yaml': {
            description: 'Top',
            schema: 'vnd,top',
            include: [{ name: 'names.yaml', 'property-allowlist': ['clock-names'] }],
          },
        },
        'top.yaml',
      );

      expect([...binding.propertySpecs.keys()]).toEqual(['clock-names']);
    });

    it('narrows patterns that match a blocklisted name', () => {
      const binding = resolveFile(
        {
          'names.yaml': {
            description: 'Names',
            properties: { '.*-names': { type: 'string-array' }, a: { type: 'int' } },
          },
          'top.yaml': {
            description: 'Top',
            schema: 'vnd,top',
            include: [{ name: 'names.yaml', 'property-blocklist': ['clock-names', 'a'] }],
          },
        },
        'top.yaml',
      );

      expect([...binding.propertySpecs.keys()]).toEqual(['(?!^clock-names$).*-names']);
      expect(binding.matchingSpecs('clock-names')).toEqual([]);
      expect(binding.matchingSpecs('reg-names')).toHaveLength(1);
    });

    it('rejects an allowlist combined with a blocklist before loading the include', () => {
      expect(() =>
        resolveFile(
          {
            'top.yaml': {
              description: 'Top',
              schema: 'vnd,top',
              include: [{ name: 'missing.yaml', 'property-allowlist': ['x'], 'property-blocklist': ['y'] }],
            },
          },
          'top.yaml',
        ),
      ).toThrow(/should not specify both 'property-allowlist:' and 'property-blocklist:'$/);
    });

    it('rejects combined lists in a nested child-binding filter', () => {
      expect(() =>
        resolveFile(
          {
            'top.yaml': {
              description: 'Top',
              schema: 'vnd,top',
              include: [
                {
                  name: 'missing.yaml',
                  'child-binding': {
                    'child-binding': { 'property-allowlist': ['x'], 'property-blocklist': ['y'] },
                  },
                },
              ],
            },
          },
          'top.yaml',
        ),
      ).toThrow(/in a 'child-binding:'/);
    });

    it('rejects unexpected keys in an include entry', () => {
      expect(() =>
        resolveFile(
          {
            'base.yaml': base,
            'top.yaml': { description: 'Top', schema: 'vnd,top', include: [{ name: 'base.yaml', extra: 1 }] },
          },
          'top.yaml',
        ),
      ).toThrow(SchemaError);
    });

    it('reports includes that cannot be found', () => {
      expect(() =>
        resolveFile({ 'top.yaml': { description: 'Top', schema: 'vnd,top', include: 'nope.yaml' } }, 'top.yaml'),
      ).toThrow("top.yaml: 'nope.yaml' not found");
    });

    it('ORs required flags', () => {
      const binding = resolveFile(
        {
          'base.yaml': base,
          'top.yaml': {
            description: 'Top',
            schema: 'vnd,top',
            include: 'base.yaml',
            properties: { x: { required: true } },
          },
        },
        'top.yaml',
      );

      const x = binding.propertySpecs.get('x');
      expect(x?.required).toBe(true);
      expect(x?.type).toBe('int');
      expect(x?.path).toBe('top.yaml');
    });

    it('does not let an including binding relax required', () => {
      expect(() =>
        resolveFile(
          {
            'base.yaml': base,
            'top.yaml': {
              description: 'Top',
              schema: 'vnd,top',
              include: 'base.yaml',
              properties: { y: { required: false } },
            },
          },
          'top.yaml',
        ),
      ).toThrow("'required' from included file overwritten");
    });

    it('rejects a conflicting redefinition', () => {
      expect(() =>
        resolveFile(
          {
            'base.yaml': base,
            'top.yaml': {
              description: 'Top',
              schema: 'vnd,top',
              include: 'base.yaml',
              properties: { x: { type: 'string' } },
            },
          },
          'top.yaml',
        ),
      ).toThrow("'type' from included file overwritten ('int' replaced with 'string')");
    });
  });

  describe('child bindings', () => {
    const parent = {
      description: 'Parent',
      schema: 'vnd,parent',
      'child-binding': {
        description: 'Each child',
        properties: {
          label: { type: 'string', required: true },
          other: { type: 'int' },
        },
      },
    };

    it('normalizes child-binding into a node property', () => {
      const binding = resolveFile({ 'parent.yaml': parent }, 'parent.yaml');

      expect(binding.propertySpecs.size).toBe(0);
      expect([...binding.childBindings.keys()]).toEqual(['.*']);
      const [child] = binding.childBindingsFor('led_0');
      expect(child?.schema).toBeNull();
      expect(child?.propertySpecs.get('label')?.required).toBe(true);
    });

    it('applies child filters to included child bindings', () => {
      const binding = resolveFile(
        {
          'parent.yaml': parent,
          'top.yaml': {
            description: 'Top',
            schema: 'vnd,top',
            include: [{ name: 'parent.yaml', 'child-binding': { 'property-allowlist': ['label'] } }],
          },
        },
        'top.yaml',
      );

      const [child] = binding.childBindingsFor('led_0');
      expect([...(child?.propertySpecs.keys() ?? [])]).toEqual(['label']);
    });

    it('matches child name patterns at the start of the name', () => {
      const binding = resolveFile(
        {
          'leds.yaml': {
            description: 'LEDs',
            schema: 'vnd,leds',
            properties: {
              'led_[0-9]+': { type: 'node', properties: { brightness: { type: 'int' } } },
            },
          },
        },
        'leds.yaml',
      );

      expect(binding.childBindingsFor('led_12')).toHaveLength(1);
      expect(binding.childBindingsFor('xled_1')).toHaveLength(0);
    });
  });

  describe('validation', () => {
    function check(doc: object, dialect: BindingDialect = softwareDialect): () => Binding {
      return () => resolveFile({ 'doc.yaml': doc }, 'doc.yaml', dialect);
    }

    it('requires a description', () => {
      expect(check({ schema: 'vnd,a' })).toThrow("doc.yaml: missing 'description'");
    });

    it('requires a schema', () => {
      expect(check({ description: 'A' })).toThrow("doc.yaml: missing 'schema' property");
    });

    it('rejects legacy keys', () => {
      expect(check({ description: 'A', schema: 'vnd,a', 'sub-node': {} })).toThrow(/legacy 'sub-node:'/);
    });

    it('rejects unknown top-level keys', () => {
      expect(check({ description: 'A', schema: 'vnd,a', color: 'red' })).toThrow(/unknown key 'color'/);
    });

    it('rejects unknown property keys', () => {
      expect(check({ description: 'A', schema: 'vnd,a', properties: { p: { type: 'int', size: 4 } } }))
        .toThrow(/unknown setting 'size'/);
    });

    it('rejects unknown types', () => {
      expect(check({ description: 'A', schema: 'vnd,a', properties: { p: { type: 'phandle' } } }))
        .toThrow(/has unknown type 'phandle'/);
    });

    it('rejects defaults on reference types', () => {
      expect(
        check({ description: 'A', compatible: 'vnd,a', properties: { p: { type: 'phandle', default: 1 } } }, hardwareDialect),
      ).toThrow(/'default:' can't be combined with 'type: phandle'/);
    });

    it('rejects defaults of the wrong shape', () => {
      expect(check({ description: 'A', schema: 'vnd,a', properties: { p: { type: 'array', default: [1, 'b'] } } }))
        .toThrow(/is invalid for 'p'/);
    });

    it('accepts byte-array defaults as int lists or hex strings', () => {
      const binding = resolveFile(
        {
          'doc.yaml': {
            description: 'A',
            schema: 'vnd,a',
            properties: {
              list: { type: 'uint8-array', default: [1, 2] },
              hex: { type: 'uint8-array', default: '0a 0b' },
            },
          },
        },
        'doc.yaml',
      );
      expect(binding.propertySpecs.get('hex')?.default).toBe('0a 0b');
      expect(check({ description: 'A', schema: 'vnd,a', properties: { p: { type: 'uint8-array', default: '0g' } } }))
        .toThrow(SchemaError);
    });

    it('rejects byte-array defaults and consts outside 0..255', () => {
      expect(check({ description: 'A', schema: 'vnd,a', properties: { p: { type: 'uint8-array', default: [300, -1] } } }))
        .toThrow("'default: [300,-1]' is invalid for 'p' in 'properties:', which has type uint8-array");
      expect(check({ description: 'A', schema: 'vnd,a', properties: { p: { type: 'uint8-array', const: [0, 256] } } }))
        .toThrow(SchemaError);
      expect(check({ description: 'A', schema: 'vnd,a', properties: { p: { type: 'uint8-array', default: [0, 255] } } }))
        .not.toThrow();
    });

    it('restricts const to scalar and array types', () => {
      expect(check({ description: 'A', schema: 'vnd,a', properties: { p: { type: 'boolean', const: true } } }))
        .toThrow(/const for property 'p' has type 'boolean'/);
    });

    it('rejects required together with deprecated', () => {
      expect(
        check({ description: 'A', schema: 'vnd,a', properties: { p: { type: 'int', required: true, deprecated: true } } }),
      ).toThrow(/should not have both 'deprecated' and 'required' set/);
    });

    it('requires plural names or a specifier space on phandle-array', () => {
      expect(
        check({ description: 'A', compatible: 'vnd,a', properties: { pwm: { type: 'phandle-array' } } }, hardwareDialect),
      ).toThrow(/does not end in 's'/);
      expect(
        check(
          { description: 'A', compatible: 'vnd,a', properties: { pwm: { type: 'phandle-array', 'specifier-space': 'pwm' } } },
          hardwareDialect,
        )(),
      ).toBeInstanceOf(Binding);
    });

    it('only allows specifier-space on phandle-array', () => {
      expect(
        check({ description: 'A', compatible: 'vnd,a', properties: { p: { type: 'int', 'specifier-space': 'x' } } }, hardwareDialect),
      ).toThrow(/expected 'phandle-array'/);
    });

    it('accepts software sized integer and pointer types', () => {
      const binding = check({
        description: 'A',
        schema: 'vnd,a',
        properties: {
          a: { type: 'uint16', default: 7 },
          b: { type: 'int64-array' },
          c: { type: 'pointer' },
          d: { type: 'double', default: 0.5 },
        },
      })();
      expect(binding.propertySpecs.get('a')?.typeInfo).toEqual({ kind: 'integer', defaultAllowed: true, bits: 16, signed: false });
      expect(binding.propertySpecs.get('c')?.kind).toBe('node-reference');
    });
  });
});
