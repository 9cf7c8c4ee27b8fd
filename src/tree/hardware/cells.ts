/**
 * u32 cell arithmetic for hardware property values.
 */

import { PropertyError } from '../../errors.js';

const U32_MAX = 0xffffffff;
const CELL_BASE = 2 ** 32;

/**
 * Combine big-endian cells into one number.
 */
export function cellsToNumber(cells: readonly number[]): number {
  let value = 0;
  for (const cell of cells) {
    value = value * CELL_BASE + cell;
  }
  if (!Number.isSafeInteger(value)) {
    throw new PropertyError(`cell value <${cells.map(c => `0x${c.toString(16)}`).join(' ')}> exceeds the safe integer range`);
  }
  return value;
}

/**
 * Combine big-endian cells into one unbounded integer. Addresses with
 * three or more cells, such as PCI ones, need this.
 */
export function cellsToBigInt(cells: readonly number[]): bigint {
  let value = 0n;
  for (const cell of cells) {
    value = (value << 32n) | BigInt(cell);
  }
  return value;
}

function padLeft(cells: readonly number[], length: number, fill: number): number[] {
  return [...new Array<number>(length - cells.length).fill(fill), ...cells];
}

/**
 * Bitwise AND; the shorter operand is padded on the left with all-ones cells.
 */
export function andCells(a: readonly number[], b: readonly number[]): number[] {
  const length = Math.max(a.length, b.length);
  const pa = padLeft(a, length, U32_MAX);
  const pb = padLeft(b, length, U32_MAX);
  return pa.map((x, i) => (x & pb[i]) >>> 0);
}

/**
 * Bitwise OR; the shorter operand is padded on the left with zero cells.
 */
export function orCells(a: readonly number[], b: readonly number[]): number[] {
  const length = Math.max(a.length, b.length);
  const pa = padLeft(a, length, 0);
  const pb = padLeft(b, length, 0);
  return pa.map((x, i) => (x | pb[i]) >>> 0);
}

export function notCells(a: readonly number[]): number[] {
  return a.map(x => ~x >>> 0);
}

export function sameCells(a: readonly number[], b: readonly number[]): boolean {
  return a.length === b.length && a.every((x, i) => x === b[i]);
}

/**
 * Split cells into entries of `width` cells.
 *
 * @param what - property description for the error message
 * @param hint - how the width was computed, for the error message
 */
export function sliceCells<T>(cells: readonly T[], width: number, what: string, hint: string): T[][] {
  if (width === 0 || cells.length % width !== 0) {
    throw new PropertyError(
      `${what} has ${cells.length} cells, which is not evenly divisible by ${width} (= ${hint}). ` +
        'Note that #*-cells properties come either from the parent node or ' +
        "from the controller (in the case of 'interrupts').",
    );
  }
  const entries: T[][] = [];
  for (let i = 0; i < cells.length; i += width) {
    entries.push(cells.slice(i, i + width));
  }
  return entries;
}
