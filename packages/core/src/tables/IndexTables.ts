import { InvalidArgumentError } from '../errors.js';
import type { IntegerWidth, NumericBuffer, RankValue } from '../width/IntegerWidth.js';

/** Largest number of cells one set of tables may hold (32 MiB at 64 bits) */
export const MAX_TABLE_CELLS = 4194304;

/** Cells needed for N choose K: N + (N - 1) + ... + (N - K + 2) */
export function tableCellCount(itemCount: number, groupSize: number): number {
  const rows = Math.max(groupSize - 1, 0);
  return rows * itemCount - (rows * (rows - 1)) / 2;
}

/**
 * @throws {InvalidArgumentError} if the tables for N choose K would exceed {@link MAX_TABLE_CELLS}
 */
export function assertTableCapacity(itemCount: number, groupSize: number): void {
  const cells = tableCellCount(itemCount, groupSize);
  if (cells > MAX_TABLE_CELLS) {
    throw new InvalidArgumentError(
      `${itemCount} choose ${groupSize} needs ${cells} table cells, more than the limit of ${MAX_TABLE_CELLS}`
    );
  }
}

/**
 * The K-1 index tables of an N choose K engine, stored row after row in a
 * single buffer.
 *
 * Row i (0 = most significant) has N - i cells and cell j holds C(j, K - i),
 * which is 0 whenever j < K - i. Every row is non-decreasing along j.
 */
export class IndexTables<R extends RankValue> {
  private readonly cells: NumericBuffer<R>;
  private readonly offsets: readonly number[];
  private readonly lengths: readonly number[];

  private constructor(
    readonly width: IntegerWidth<R>,
    cells: NumericBuffer<R>,
    offsets: number[],
    lengths: number[]
  ) {
    this.cells = cells;
    this.offsets = offsets;
    this.lengths = lengths;
  }

  /**
   * Build the tables for N items taken K at a time.
   * Returns undefined for K = 1, where ranking is the identity.
   *
   * @throws {InvalidArgumentError} if the tables would exceed {@link MAX_TABLE_CELLS}
   */
  static build<R extends RankValue>(itemCount: number, groupSize: number, width: IntegerWidth<R>): IndexTables<R> | undefined {
    if (groupSize === 1) {
      return undefined;
    }
    assertTableCapacity(itemCount, groupSize);

    const rowCount = groupSize - 1;
    const offsets: number[] = [];
    const lengths: number[] = [];
    let total = 0;
    for (let i = 0; i < rowCount; i++) {
      offsets.push(total);
      lengths.push(itemCount - i);
      total += itemCount - i;
    }

    const tables = new IndexTables(width, width.allocate(total), offsets, lengths);
    tables.seedPairs();
    tables.propagate();
    return tables;
  }

  /** Number of rows (K - 1) */
  get rowCount(): number {
    return this.lengths.length;
  }

  /** Cells in row i (N - i) */
  rowLength(row: number): number {
    return this.lengths[row];
  }

  /** C(column, K - row) */
  get(row: number, column: number): R {
    return this.cells[this.offsets[row] + column];
  }

  /** Copy of one row */
  row(row: number): R[] {
    const values: R[] = [];
    for (let j = 0; j < this.lengths[row]; j++) {
      values.push(this.get(row, j));
    }
    return values;
  }

  /** Copies of every row, most significant first */
  toArrays(): R[][] {
    const rows: R[][] = [];
    for (let i = 0; i < this.rowCount; i++) {
      rows.push(this.row(i));
    }
    return rows;
  }

  /**
   * Largest column whose cell is <= `remaining`, scanning down from the
   * top of the row. Returns -1 if none qualifies, which cannot happen for
   * a non-negative remainder since column 0 holds 0.
   */
  largestFit(row: number, remaining: R): number {
    const offset = this.offsets[row];
    for (let j = this.lengths[row] - 1; j >= 0; j--) {
      if (this.width.compare(this.cells[offset + j], remaining) <= 0) {
        return j;
      }
    }
    return -1;
  }

  private set(row: number, column: number, value: R): void {
    this.cells[this.offsets[row] + column] = value;
  }

  /** Last row: C(j, 2), the triangular numbers 0, 0, 1, 3, 6, 10, ... */
  private seedPairs(): void {
    const last = this.rowCount - 1;
    let value = this.width.one;
    let increment = 2;
    for (let j = 2; j < this.lengths[last]; j++) {
      this.set(last, j, value);
      value = this.width.add(value, this.width.fromIndex(increment++));
    }
  }

  /**
   * Remaining rows, bottom up, by Pascal's rule:
   * C(j, m) = C(j-1, m) + C(j-1, m-1).
   */
  private propagate(): void {
    const groupSize = this.rowCount + 1;
    for (let i = this.rowCount - 2; i >= 0; i--) {
      const start = groupSize - i;
      const end = this.lengths[i];
      // C(m, m) = 1; the cells below it stay 0
      this.set(i, start, this.width.one);
      for (let j = start + 1; j < end; j++) {
        this.set(i, j, this.width.add(this.get(i, j - 1), this.get(i + 1, j - 1)));
      }
    }
  }
}
