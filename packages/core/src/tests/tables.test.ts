import { describe, it, expect } from 'vitest';
import { binomialWide } from '../binomial/Binomial.js';
import { IndexTables, MAX_TABLE_CELLS, tableCellCount } from '../tables/IndexTables.js';
import { InvalidArgumentError } from '../errors.js';
import { INT32, INT64 } from '../width/IntegerWidth.js';

function expectBinomialInvariant(itemCount: number, groupSize: number): void {
  const tables = IndexTables.build(itemCount, groupSize, INT32);
  expect(tables).toBeDefined();
  if (!tables) return;

  expect(tables.rowCount).toBe(groupSize - 1);
  for (let i = 0; i < tables.rowCount; i++) {
    expect(tables.rowLength(i)).toBe(itemCount - i);
    for (let j = 0; j < tables.rowLength(i); j++) {
      expect(tables.get(i, j)).toBe(Number(binomialWide(j, groupSize - i)));
    }
  }
}

describe('IndexTables', () => {
  it('builds nothing for K = 1', () => {
    expect(IndexTables.build(6, 1, INT32)).toBeUndefined();
  });

  it('builds the 7 choose 3 tables', () => {
    const tables = IndexTables.build(7, 3, INT32);
    expect(tables?.toArrays()).toEqual([
      [0, 0, 0, 1, 4, 10, 20],
      [0, 0, 1, 3, 6, 10]
    ]);
  });

  it('seeds a single row of triangular numbers for K = 2', () => {
    const tables = IndexTables.build(6, 2, INT32);
    expect(tables?.toArrays()).toEqual([[0, 0, 1, 3, 6, 10]]);
  });

  it.each([
    [13, 5],
    [10, 2],
    [9, 8],
    [4, 3],
    [20, 10]
  ])('holds C(j, K - i) in every cell for %i choose %i', (n, k) => {
    expectBinomialInvariant(n, k);
  });

  it('holds the invariant at 64 bits for 66 choose 33', () => {
    const tables = IndexTables.build(66, 33, INT64);
    expect(tables).toBeDefined();
    if (!tables) return;

    for (let i = 0; i < tables.rowCount; i++) {
      for (let j = 0; j < tables.rowLength(i); j++) {
        expect(tables.get(i, j)).toBe(binomialWide(j, 33 - i));
      }
    }
    expect(tables.get(0, 65)).toBe(3609714217008132870n);
  });

  it('finds the largest column not above a remainder', () => {
    const tables = IndexTables.build(7, 3, INT32);
    expect(tables?.largestFit(0, 0)).toBe(2);
    expect(tables?.largestFit(0, 9)).toBe(4);
    expect(tables?.largestFit(0, 34)).toBe(6);
    expect(tables?.largestFit(1, 3)).toBe(3);
  });

  it('returns row copies', () => {
    const tables = IndexTables.build(7, 3, INT32);
    const row = tables?.row(1) ?? [];
    row[2] = 99;
    expect(tables?.get(1, 2)).toBe(1);
  });

  it('counts the cells of every row', () => {
    expect(tableCellCount(13, 5)).toBe(13 + 12 + 11 + 10);
    expect(tableCellCount(7, 2)).toBe(7);
    expect(tableCellCount(9, 1)).toBe(0);
  });

  it('refuses to allocate past the cell limit', () => {
    expect(() => IndexTables.build(MAX_TABLE_CELLS + 1, 2, INT64)).toThrow(InvalidArgumentError);
  });
});
