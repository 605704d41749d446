import { checkedBinomial } from '../binomial/Binomial.js';
import { type Combination, normalizeCombination } from '../combination/Combination.js';
import { InvalidArgumentError, OutOfRangeError } from '../errors.js';
import { IndexTables, assertTableCapacity } from '../tables/IndexTables.js';
import { INT32, INT64, type IntegerWidth, type RankValue, type WidthName } from '../width/IntegerWidth.js';

/**
 * Ranks and unranks the K-element combinations of {0, ..., N-1}.
 *
 * Combinations are ordered by comparing their descending tuples
 * lexicographically: rank 0 is [K-1, ..., 1, 0] and the last rank is
 * [N-1, ..., N-K]. For 13 choose 5, [12, 11, 10, 9, 8] has rank 1286.
 *
 * The tables are built once in the constructor and never written again, so
 * one engine can serve any number of callers.
 */
export class CombinadicEngine<R extends RankValue> {
  /** Number of items (N) */
  readonly itemCount: number;

  /** Items per combination (K) */
  readonly groupSize: number;

  /** C(N, K) */
  readonly totalCombinations: R;

  readonly width: IntegerWidth<R>;

  private readonly indexTables: IndexTables<R> | undefined;

  private constructor(itemCount: number, groupSize: number, width: IntegerWidth<R>) {
    if (!Number.isInteger(itemCount) || !Number.isInteger(groupSize)) {
      throw new InvalidArgumentError(`N and K must be integers, got N=${itemCount}, K=${groupSize}`);
    }
    if (groupSize < 1) {
      throw new InvalidArgumentError(`K must be at least 1, got ${groupSize}`);
    }
    if (itemCount <= groupSize) {
      throw new InvalidArgumentError(`N must be greater than K, got N=${itemCount}, K=${groupSize}`);
    }

    // before C(N, K): its cost grows with K and a huge pair would stall there
    assertTableCapacity(itemCount, groupSize);

    this.itemCount = itemCount;
    this.groupSize = groupSize;
    this.width = width;
    this.totalCombinations = checkedBinomial(itemCount, groupSize, width);
    this.indexTables = IndexTables.build(itemCount, groupSize, width);
  }

  /** Engine limited to C(N, K) <= 2^31 - 1, with number ranks */
  static int32(itemCount: number, groupSize: number): CombinadicEngine<number> {
    return new CombinadicEngine(itemCount, groupSize, INT32);
  }

  /** Engine limited to C(N, K) <= 2^63 - 1, with bigint ranks */
  static int64(itemCount: number, groupSize: number): CombinadicEngine<bigint> {
    return new CombinadicEngine(itemCount, groupSize, INT64);
  }

  /**
   * Rank of a combination.
   *
   * @param combination - K distinct values in [0, N); not modified
   * @param alreadySorted - skip sorting; the tuple must then be strictly descending
   * @throws {OutOfRangeError} for a value outside [0, N) or a tuple of the wrong length
   * @throws {InvalidCombinationError} for duplicates or an unsorted tuple marked as sorted
   */
  rank(combination: readonly number[], alreadySorted: boolean = false): R {
    const values = normalizeCombination(combination, this.itemCount, this.groupSize, alreadySorted);
    if (this.indexTables === undefined) {
      return this.width.fromIndex(values[0]);
    }

    let rank = this.width.zero;
    for (let i = 0; i < this.indexTables.rowCount; i++) {
      rank = this.width.add(rank, this.indexTables.get(i, values[i]));
    }
    return this.width.add(rank, this.width.fromIndex(values[this.groupSize - 1]));
  }

  /**
   * Combination at a rank, in descending order.
   *
   * @param out - optional array to fill; it must hold K values
   * @throws {OutOfRangeError} if rank is not an integer in [0, total)
   */
  unrank(rank: R, out?: Combination): Combination {
    this.assertRank(rank);
    const result = out ?? new Array<number>(this.groupSize).fill(0);
    if (result.length !== this.groupSize) {
      throw new OutOfRangeError(`Output buffer holds ${result.length} values, expected ${this.groupSize}`);
    }

    if (this.indexTables === undefined) {
      result[0] = this.width.toIndex(rank);
      return result;
    }

    let remaining = rank;
    for (let i = 0; i < this.indexTables.rowCount; i++) {
      const column = this.indexTables.largestFit(i, remaining);
      result[i] = column;
      remaining = this.width.subtract(remaining, this.indexTables.get(i, column));
    }
    result[this.groupSize - 1] = this.width.toIndex(remaining);
    return result;
  }

  /**
   * Read-only copies of the index tables (empty for K = 1).
   * Row i holds C(j, K - i) for j in [0, N - i).
   */
  tables(): ReadonlyArray<ReadonlyArray<R>> {
    return this.indexTables?.toArrays() ?? [];
  }

  /** Walk every combination in rank order, or from the last rank down */
  *combinations(descending: boolean = false): Generator<Combination> {
    const { width } = this;
    const last = width.subtract(this.totalCombinations, width.one);
    if (descending) {
      for (let r = last; width.compare(r, width.zero) >= 0; r = width.subtract(r, width.one)) {
        yield this.unrank(r);
      }
    } else {
      for (let r = width.zero; width.compare(r, last) <= 0; r = width.add(r, width.one)) {
        yield this.unrank(r);
      }
    }
  }

  /**
   * Parse a decimal rank, e.g. from a command line or query string.
   *
   * @throws {OutOfRangeError} if the text is not an integer in [0, total)
   */
  parseRank(text: string): R {
    const rank = this.width.parse(text);
    if (rank === undefined) {
      throw new OutOfRangeError(`Rank "${text}" is not an integer`);
    }
    this.assertRank(rank);
    return rank;
  }

  /** True if `value` is a valid rank for this engine */
  isRank(value: unknown): value is R {
    return this.width.isRank(value)
      && this.width.compare(value, this.width.zero) >= 0
      && this.width.compare(value, this.totalCombinations) < 0;
  }

  private assertRank(rank: R): void {
    if (!this.isRank(rank)) {
      throw new OutOfRangeError(`Rank ${String(rank)} is outside [0, ${String(this.totalCombinations)})`);
    }
  }
}

export type AnyCombinadicEngine = CombinadicEngine<number> | CombinadicEngine<bigint>;

/**
 * Factory for an engine of the given width
 */
export function createEngine(itemCount: number, groupSize: number, width?: 'int32'): CombinadicEngine<number>;
export function createEngine(itemCount: number, groupSize: number, width: 'int64'): CombinadicEngine<bigint>;
export function createEngine(itemCount: number, groupSize: number, width: WidthName): AnyCombinadicEngine;
export function createEngine(itemCount: number, groupSize: number, width: WidthName = 'int32'): AnyCombinadicEngine {
  switch (width) {
    case 'int32':
      return CombinadicEngine.int32(itemCount, groupSize);
    case 'int64':
      return CombinadicEngine.int64(itemCount, groupSize);
    default:
      throw new InvalidArgumentError(`Unknown integer width: ${String(width)}`);
  }
}

/** Narrow an engine of unknown width to the 64-bit one */
export function isWideEngine(engine: AnyCombinadicEngine): engine is CombinadicEngine<bigint> {
  return engine.width.name === 'int64';
}
