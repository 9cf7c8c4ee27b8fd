/**
 * Address decoding for hardware nodes.
 *
 * This module handles:
 * - `reg` entries, sized by the parent's #address-cells and #size-cells
 * - `ranges` entries of bus nodes
 * - Translating child bus addresses through the parents' `ranges`
 * - Unit addresses taken from node names
 */

import { PropertyError } from '../../errors.js';
import { cellsToBigInt, sliceCells } from './cells.js';
import type { HardwareNode } from './HardwareNode.js';

/** Default #address-cells when a node does not set it */
const DEFAULT_ADDRESS_CELLS = 2;
/** Default #size-cells when a node does not set it */
const DEFAULT_SIZE_CELLS = 1;

/**
 * One register block from `reg`.
 */
export interface Register {
  /** Name from `reg-names` */
  name: string | null;
  /** Translated address, null when #address-cells is 0 */
  addr: bigint | null;
  /** Null when #size-cells is 0 */
  size: bigint | null;
}

/**
 * One translation entry from `ranges`.
 */
export interface AddressRange {
  childBusCells: number;
  childBusAddr: bigint | null;
  parentBusCells: number;
  parentBusAddr: bigint | null;
  lengthCells: number;
  length: bigint | null;
}

/**
 * Cells per address in the node's `reg`, set by its parent.
 */
export function addressCells(node: HardwareNode): number {
  return node.parent?.optionalNumber('#address-cells') ?? DEFAULT_ADDRESS_CELLS;
}

/**
 * Cells per size in the node's `reg`, set by its parent.
 */
export function sizeCells(node: HardwareNode): number {
  return node.parent?.optionalNumber('#size-cells') ?? DEFAULT_SIZE_CELLS;
}

function bigIntOrNull(cells: readonly number[]): bigint | null {
  return cells.length === 0 ? null : cellsToBigInt(cells);
}

export function decodeRegs(node: HardwareNode): Register[] {
  if (!node.hasRaw('reg')) {
    return [];
  }
  const nAddr = addressCells(node);
  const nSize = sizeCells(node);
  const entries = sliceCells(
    node.numbersOf('reg'),
    nAddr + nSize,
    `'reg' property in ${node.path}`,
    `<#address-cells> (= ${nAddr}) + <#size-cells> (= ${nSize})`,
  );

  const regs = entries.map((entry): Register => {
    const rawAddr = bigIntOrNull(entry.slice(0, nAddr));
    const size = bigIntOrNull(entry.slice(nAddr));
    if (size === 0n && !node.isPciDevice) {
      throw new PropertyError(
        "zero-sized 'reg' seems meaningless (maybe you want a size of one or #size-cells = 0 instead)",
        node.path,
      );
    }
    return { name: null, addr: rawAddr === null ? null : translateAddress(rawAddr, node), size };
  });
  return node.applyNames('reg', regs);
}

export function decodeRanges(node: HardwareNode): AddressRange[] {
  if (!node.hasRaw('ranges')) {
    return [];
  }
  const childAddr = node.optionalNumber('#address-cells') ?? DEFAULT_ADDRESS_CELLS;
  const parentAddr = addressCells(node);
  const childSize = node.optionalNumber('#size-cells') ?? DEFAULT_SIZE_CELLS;
  const width = childAddr + parentAddr + childSize;
  const values = node.numbersOf('ranges');

  if (width === 0) {
    if (values.length === 0) {
      return [];
    }
    throw new PropertyError(
      `'ranges' should be empty since <#address-cells> = ${childAddr}, ` +
        `<#address-cells for parent> = ${parentAddr} and <#size-cells> = ${childSize}`,
      node.path,
    );
  }

  const entries = sliceCells(
    values,
    width,
    `'ranges' property in ${node.path}`,
    `<#address-cells> (= ${childAddr}) + <#address-cells for parent> (= ${parentAddr}) + <#size-cells> (= ${childSize})`,
  );
  return entries.map(entry => ({
    childBusCells: childAddr,
    childBusAddr: bigIntOrNull(entry.slice(0, childAddr)),
    parentBusCells: parentAddr,
    parentBusAddr: bigIntOrNull(entry.slice(childAddr, childAddr + parentAddr)),
    lengthCells: childSize,
    length: bigIntOrNull(entry.slice(childAddr + parentAddr)),
  }));
}

/**
 * Translate `addr` on `node`'s bus to the root address space by walking
 * the parents' `ranges`. Addresses outside every range stay unchanged.
 */
export function translateAddress(addr: bigint, node: HardwareNode): bigint {
  const parent = node.parent;
  if (parent === undefined || !parent.hasRaw('ranges')) {
    return addr;
  }
  const values = parent.numbersOf('ranges');
  if (values.length === 0) {
    // Empty ranges: identical address spaces.
    return translateAddress(addr, parent);
  }

  const childAddr = addressCells(node);
  const parentAddr = addressCells(parent);
  const childSize = sizeCells(node);
  const entries = sliceCells(
    values,
    childAddr + parentAddr + childSize,
    `'ranges' property in ${parent.path}`,
    `<#address-cells> (= ${childAddr}) + <#address-cells for parent> (= ${parentAddr}) + <#size-cells> (= ${childSize})`,
  );
  for (const entry of entries) {
    const childBase = cellsToBigInt(entry.slice(0, childAddr));
    const parentBase = cellsToBigInt(entry.slice(childAddr, childAddr + parentAddr));
    const length = cellsToBigInt(entry.slice(childAddr + parentAddr));
    if (childBase <= addr && addr < childBase + length) {
      return translateAddress(parentBase + addr - childBase, parent);
    }
  }
  return addr;
}

/**
 * The translated `@<unit-address>` part of the node name. Null without a
 * unit address and for PCI devices, whose names use `<dev>,<func>`.
 */
export function unitAddress(node: HardwareNode): bigint | null {
  const at = node.name.indexOf('@');
  if (at < 0 || node.isPciDevice) {
    return null;
  }
  const text = node.name.slice(at + 1);
  if (!/^[0-9a-fA-F]+$/.test(text)) {
    throw new PropertyError('node has non-hex unit address', node.path);
  }
  return translateAddress(BigInt(`0x${text}`), node);
}
