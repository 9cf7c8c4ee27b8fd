import { describe, it, expect } from 'vitest';
import { andCells, cellsToBigInt, cellsToNumber, notCells, orCells, sameCells, sliceCells } from './cells.js';
import { PropertyError } from '../../errors.js';

describe('cells', () => {
  it('combines cells big-endian', () => {
    expect(cellsToNumber([])).toBe(0);
    expect(cellsToNumber([0x10])).toBe(16);
    expect(cellsToNumber([0x1, 0x2])).toBe(0x100000002);
  });

  it('rejects values beyond the safe integer range', () => {
    expect(() => cellsToNumber([0xffffffff, 0xffffffff])).toThrow(PropertyError);
  });

  it('combines any number of cells into a bigint', () => {
    expect(cellsToBigInt([])).toBe(0n);
    expect(cellsToBigInt([0x02000000, 0x0, 0x10000000])).toBe(0x020000000000000010000000n);
  });

  it('pads AND with ones and OR with zeros', () => {
    expect(andCells([0xf0], [0x1, 0xff])).toEqual([0x1, 0xf0]);
    expect(orCells([0xf0], [0x1, 0x0f])).toEqual([0x1, 0xff]);
  });

  it('keeps results unsigned', () => {
    expect(notCells([0])).toEqual([0xffffffff]);
    expect(andCells([0xffffffff], [0xffffffff])).toEqual([0xffffffff]);
  });

  it('compares cell lists', () => {
    expect(sameCells([1, 2], [1, 2])).toBe(true);
    expect(sameCells([1, 2], [1])).toBe(false);
  });

  it('slices into entries', () => {
    expect(sliceCells([1, 2, 3, 4], 2, "'reg'", '2')).toEqual([
      [1, 2],
      [3, 4],
    ]);
    expect(() => sliceCells([1, 2, 3], 2, "'reg'", '2')).toThrow('not evenly divisible by 2');
  });
});
