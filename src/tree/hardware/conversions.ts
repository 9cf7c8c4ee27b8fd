/**
 * Conversion table for hardware property values.
 */

import { PropertyError } from '../../errors.js';
import { unsupported, type ConversionTable } from '../conversions.js';
import { indexedReferenceList, specifierSpaceFor } from './phandle.js';
import { formatRawValue, isCellRef, rawTypeOf, type RawHardwareType, type RawHardwareValue } from './raw.js';
import type { PropertySpec } from '../../binding/PropertySpec.js';
import type { HardwareNode } from './HardwareNode.js';

function mismatch(raw: RawHardwareValue, spec: PropertySpec, node: HardwareNode, form: string): never {
  throw new PropertyError(
    `expected property '${spec.name}' to be assigned with '${spec.name} = ${form};', not '${formatRawValue(raw)}'`,
    node.path,
  );
}

function requireType(
  raw: RawHardwareValue,
  accepted: readonly RawHardwareType[],
  spec: PropertySpec,
  node: HardwareNode,
  form: string,
): void {
  if (!accepted.includes(rawTypeOf(raw))) {
    mismatch(raw, spec, node, form);
  }
}

export const hardwareConversions: ConversionTable<RawHardwareValue, HardwareNode> = {
  boolean: (raw, spec, node) => {
    if (raw.type !== 'empty') {
      throw new PropertyError(
        `'${spec.name}' is defined with 'type: boolean' in ${spec.path}, but is assigned a value ` +
          `('${formatRawValue(raw)}') instead of being empty ('${spec.name};')`,
        node.path,
      );
    }
    return { kind: 'boolean', value: true };
  },

  integer: (raw, spec, node) => {
    requireType(raw, ['num'], spec, node, '< (number) >');
    return { kind: 'integer', value: node.numbersOf(spec.name)[0] };
  },

  'integer-array': (raw, spec, node) => {
    requireType(raw, ['num', 'nums'], spec, node, '< (number) (number) ... >');
    return { kind: 'integer-array', value: node.numbersOf(spec.name) };
  },

  'byte-array': (raw, spec, node) => {
    if (raw.type !== 'bytes') {
      return mismatch(raw, spec, node, '[ (byte) (byte) ... ]');
    }
    return { kind: 'byte-array', value: Uint8Array.from(raw.bytes) };
  },

  string: (raw, spec, node) => {
    requireType(raw, ['string'], spec, node, '"string"');
    return { kind: 'string', value: node.stringOf(spec.name) };
  },

  'string-array': (raw, spec, node) => {
    requireType(raw, ['string', 'strings'], spec, node, '"string", "string", ...');
    return { kind: 'string-array', value: node.stringsOf(spec.name) };
  },

  'node-reference': (raw, spec, node) => {
    requireType(raw, ['phandle'], spec, node, '< &node >');
    return { kind: 'node-reference', value: { path: node.referencedNode(spec.name).path } };
  },

  'node-reference-list': (raw, spec, node) => {
    requireType(raw, ['phandle', 'phandles'], spec, node, '< &foo &bar ... >');
    const targets = node.cellsOf(spec.name).map(cell => {
      const target = isCellRef(cell) ? node.resolveCell(cell, spec.name) : null;
      if (target === null) {
        throw new PropertyError(`'${spec.name}' references an unknown node`, node.path);
      }
      return { path: target.path };
    });
    return { kind: 'node-reference-list', value: targets };
  },

  'indexed-reference-list': (raw, spec, node) => {
    const accepted: RawHardwareType[] = ['phandle', 'phandles', 'phandles-and-nums', 'num', 'nums', 'empty'];
    requireType(raw, accepted, spec, node, '< &foo 1 2 &bar 3 ... >');
    const space = specifierSpaceFor(spec.name, spec.specifierSpace);
    return { kind: 'indexed-reference-list', value: indexedReferenceList(node, spec.name, space) };
  },

  path: (raw, spec, node) => {
    requireType(raw, ['path', 'string'], spec, node, '&foo');
    return { kind: 'path', value: { path: node.referencedNode(spec.name).path } };
  },

  // Compound values are validated for presence only.
  opaque: () => undefined,

  float: unsupported('hardware'),
  'float-array': unsupported('hardware'),
};
