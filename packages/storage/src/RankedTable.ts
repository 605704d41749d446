import { CombinadicEngine, OutOfRangeError } from '@combinadic/core';
import * as fs from 'fs';
import * as path from 'path';

/**
 * A growable table of caller values addressed by combination rank.
 *
 * Slot r belongs to the combination `engine.unrank(r)`, so a table over
 * 13 choose 5 can hold one entry per 5-card rank pattern without any
 * lookup structure.
 */
export class RankedTable<T> {
  private readonly values: T[] = [];

  constructor(readonly engine: CombinadicEngine<number>) {}

  /** Number of filled slots */
  get size(): number {
    return this.values.length;
  }

  /** Number of slots the engine can address (C(N, K)) */
  get capacity(): number {
    return this.engine.totalCombinations;
  }

  /** Add a value at the next free rank and return that rank */
  append(value: T): number {
    const rank = this.values.length;
    this.assertRank(rank);
    this.values.push(value);
    return rank;
  }

  /**
   * Store a value at a rank. Writing past the end fills every skipped
   * slot with the same value.
   */
  set(rank: number, value: T): void {
    this.assertRank(rank);
    if (rank < this.values.length) {
      this.values[rank] = value;
      return;
    }
    while (this.values.length <= rank) {
      this.values.push(value);
    }
  }

  /** Store a value at the rank of a combination and return that rank */
  setByCombination(combination: readonly number[], value: T, alreadySorted: boolean = false): number {
    const rank = this.engine.rank(combination, alreadySorted);
    this.set(rank, value);
    return rank;
  }

  /** Value at a rank, or undefined if that slot was never written */
  get(rank: number): T | undefined {
    this.assertRank(rank);
    return rank < this.values.length ? this.values[rank] : undefined;
  }

  getByCombination(combination: readonly number[], alreadySorted: boolean = false): T | undefined {
    return this.get(this.engine.rank(combination, alreadySorted));
  }

  has(rank: number): boolean {
    return this.engine.isRank(rank) && rank < this.values.length;
  }

  /** Filled slots as [rank, combination, value] */
  *entries(): Generator<[number, number[], T]> {
    for (let rank = 0; rank < this.values.length; rank++) {
      yield [rank, this.engine.unrank(rank), this.values[rank]];
    }
  }

  /** Copy of the filled slots in rank order */
  toArray(): T[] {
    return [...this.values];
  }

  private assertRank(rank: number): void {
    if (!this.engine.isRank(rank)) {
      throw new OutOfRangeError(`Rank ${rank} is outside [0, ${this.engine.totalCombinations})`);
    }
  }
}

/**
 * On-disk layout of a saved table
 */
export interface RankedTableFile<T> {
  itemCount: number;
  groupSize: number;
  values: T[];
}

/**
 * Save a table to a JSON file
 */
export function saveRankedTableJSON<T>(table: RankedTable<T>, filePath: string): void {
  const dir = path.dirname(filePath);
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }

  const data: RankedTableFile<T> = {
    itemCount: table.engine.itemCount,
    groupSize: table.engine.groupSize,
    values: table.toArray()
  };
  fs.writeFileSync(filePath, JSON.stringify(data, null, 2), 'utf-8');
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Load a table saved by {@link saveRankedTableJSON}. Each stored value is
 * checked with `isValue`.
 *
 * @throws {Error} if the file does not have the saved-table layout
 */
export function loadRankedTableJSON<T>(filePath: string, isValue: (value: unknown) => value is T): RankedTable<T> {
  const json = fs.readFileSync(filePath, 'utf-8');
  const parsed: unknown = JSON.parse(json);

  if (!isRecord(parsed)
    || typeof parsed.itemCount !== 'number'
    || typeof parsed.groupSize !== 'number'
    || !Array.isArray(parsed.values)) {
    throw new Error(`${filePath} is not a saved ranked table`);
  }

  const table = new RankedTable<T>(CombinadicEngine.int32(parsed.itemCount, parsed.groupSize));
  for (const value of parsed.values) {
    if (!isValue(value)) {
      throw new Error(`${filePath} holds a value of an unexpected type at rank ${table.size}`);
    }
    table.append(value);
  }
  return table;
}
