import { describe, it, expect } from 'vitest';
import { CombinadicEngine, createEngine, isWideEngine } from '../engine/CombinadicEngine.js';
import { InvalidArgumentError, InvalidCombinationError, OutOfRangeError, OverflowError } from '../errors.js';

/** Lexicographic comparison of two descending tuples */
function compareTuples(a: readonly number[], b: readonly number[]): number {
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) return a[i] - b[i];
  }
  return 0;
}

describe('CombinadicEngine', () => {
  describe('construction', () => {
    it('computes the total for 13 choose 5', () => {
      const engine = CombinadicEngine.int32(13, 5);
      expect(engine.itemCount).toBe(13);
      expect(engine.groupSize).toBe(5);
      expect(engine.totalCombinations).toBe(1287);
      expect(engine.width.name).toBe('int32');
    });

    it('rejects K < 1', () => {
      expect(() => CombinadicEngine.int32(5, 0)).toThrow(InvalidArgumentError);
      expect(() => CombinadicEngine.int32(5, -2)).toThrow('K must be at least 1, got -2');
    });

    it('rejects N <= K', () => {
      expect(() => CombinadicEngine.int32(5, 5)).toThrow(InvalidArgumentError);
      expect(() => CombinadicEngine.int64(3, 7)).toThrow('N must be greater than K, got N=3, K=7');
    });

    it('rejects non-integer arguments', () => {
      expect(() => CombinadicEngine.int32(7.5, 3)).toThrow(InvalidArgumentError);
    });

    it('rejects totals beyond 32 bits', () => {
      expect(() => CombinadicEngine.int32(34, 17)).toThrow(OverflowError);
      expect(CombinadicEngine.int32(33, 16).totalCombinations).toBe(1166803110);
    });

    it('rejects systems whose tables exceed the cell limit', () => {
      expect(() => CombinadicEngine.int64(3000000000, 2)).toThrow(InvalidArgumentError);
      expect(() => CombinadicEngine.int64(4194305, 2)).toThrow(
        '4194305 choose 2 needs 4194305 table cells, more than the limit of 4194304'
      );
    });

    it('checks the table size before computing a huge total', () => {
      expect(() => CombinadicEngine.int64(1e12, 5e11)).toThrow(InvalidArgumentError);
    });

    it('accepts 66 choose 33 at 64 bits and rejects 68 choose 34', () => {
      expect(CombinadicEngine.int64(66, 33).totalCombinations).toBe(7219428434016265740n);
      expect(() => CombinadicEngine.int64(68, 34)).toThrow(OverflowError);
    });
  });

  describe('13 choose 5', () => {
    const engine = CombinadicEngine.int32(13, 5);

    it('ranks the highest combination last', () => {
      expect(engine.rank([12, 11, 10, 9, 8], true)).toBe(1286);
    });

    it('unranks both ends', () => {
      expect(engine.unrank(1286)).toEqual([12, 11, 10, 9, 8]);
      expect(engine.unrank(0)).toEqual([4, 3, 2, 1, 0]);
    });

    it('sorts an unsorted tuple without touching the input', () => {
      const hand = [8, 12, 10, 9, 11];
      expect(engine.rank(hand)).toBe(1286);
      expect(hand).toEqual([8, 12, 10, 9, 11]);
    });

    it('gives every permutation the same rank', () => {
      const sorted = [9, 6, 4, 2, 1];
      const expected = engine.rank(sorted, true);
      const permutations = [
        [1, 2, 4, 6, 9],
        [4, 9, 1, 6, 2],
        [6, 1, 9, 2, 4]
      ];
      for (const tuple of permutations) {
        expect(engine.rank(tuple, false)).toBe(expected);
      }
    });

    it('fills a caller-supplied buffer', () => {
      const out = [0, 0, 0, 0, 0];
      const result = engine.unrank(1286, out);
      expect(result).toBe(out);
      expect(out).toEqual([12, 11, 10, 9, 8]);
    });

    it('round-trips every rank', () => {
      for (let r = 0; r < engine.totalCombinations; r++) {
        expect(engine.rank(engine.unrank(r), true)).toBe(r);
      }
    });
  });

  describe('7 choose 3', () => {
    const engine = CombinadicEngine.int32(7, 3);

    it('enumerates 35 distinct descending tuples in increasing order', () => {
      expect(engine.totalCombinations).toBe(35);
      const seen = new Set<string>();
      let previous: number[] | undefined;

      for (let r = 0; r < 35; r++) {
        const tuple = engine.unrank(r);
        expect(tuple[0]).toBeGreaterThan(tuple[1]);
        expect(tuple[1]).toBeGreaterThan(tuple[2]);
        expect(tuple[2]).toBeGreaterThanOrEqual(0);
        expect(tuple[0]).toBeLessThan(7);
        if (previous) {
          expect(compareTuples(previous, tuple)).toBeLessThan(0);
        }
        seen.add(tuple.join(','));
        previous = tuple;
      }

      expect(seen.size).toBe(35);
    });

    it('starts and ends at the boundary tuples', () => {
      expect(engine.unrank(0)).toEqual([2, 1, 0]);
      expect(engine.unrank(34)).toEqual([6, 5, 4]);
    });
  });

  describe('K = 1', () => {
    const engine = CombinadicEngine.int32(5, 1);

    it('is the identity', () => {
      for (let v = 0; v < 5; v++) {
        expect(engine.rank([v], true)).toBe(v);
        expect(engine.unrank(v)).toEqual([v]);
      }
    });

    it('has no tables', () => {
      expect(engine.tables()).toEqual([]);
    });

    it('still checks the range', () => {
      expect(() => engine.unrank(5)).toThrow(OutOfRangeError);
      expect(() => engine.rank([5])).toThrow(OutOfRangeError);
    });
  });

  describe('invalid input', () => {
    const engine = CombinadicEngine.int32(13, 5);

    it('rejects ranks outside [0, total)', () => {
      expect(() => engine.unrank(1287)).toThrow(OutOfRangeError);
      expect(() => engine.unrank(-1)).toThrow('Rank -1 is outside [0, 1287)');
      expect(() => engine.unrank(2.5)).toThrow(OutOfRangeError);
    });

    it('rejects values outside [0, N)', () => {
      expect(() => engine.rank([13, 11, 10, 9, 8])).toThrow('Value 13 is outside [0, 13)');
      expect(() => engine.rank([12, 11, 10, 9, -1])).toThrow(OutOfRangeError);
    });

    it('rejects tuples of the wrong length', () => {
      expect(() => engine.rank([12, 11, 10])).toThrow('Expected 5 values, got 3');
    });

    it('rejects duplicates', () => {
      expect(() => engine.rank([12, 12, 10, 9, 8])).toThrow(InvalidCombinationError);
      expect(() => engine.rank([12, 12, 10, 9, 8], true)).toThrow('contains duplicate values');
    });

    it('rejects an ascending tuple marked as sorted', () => {
      expect(() => engine.rank([8, 9, 10, 11, 12], true)).toThrow(
        'Combination [8, 9, 10, 11, 12] is not in descending order'
      );
    });

    it('rejects a mis-sized output buffer', () => {
      expect(() => engine.unrank(3, [0, 0])).toThrow(OutOfRangeError);
    });
  });

  describe('tables()', () => {
    it('exposes copies of the index tables', () => {
      const engine = CombinadicEngine.int32(7, 3);
      const tables = engine.tables();
      expect(tables).toEqual([
        [0, 0, 0, 1, 4, 10, 20],
        [0, 0, 1, 3, 6, 10]
      ]);
      expect(engine.rank([6, 5, 4], true)).toBe(34);
    });
  });

  describe('combinations()', () => {
    const engine = CombinadicEngine.int32(5, 2);

    it('walks ranks in order', () => {
      expect([...engine.combinations()]).toEqual([
        [1, 0], [2, 0], [2, 1], [3, 0], [3, 1],
        [3, 2], [4, 0], [4, 1], [4, 2], [4, 3]
      ]);
    });

    it('walks ranks from the top down', () => {
      const all = [...engine.combinations(true)];
      expect(all[0]).toEqual([4, 3]);
      expect(all[9]).toEqual([1, 0]);
      expect(all).toHaveLength(10);
    });
  });

  describe('64-bit engine', () => {
    const engine = CombinadicEngine.int64(66, 33);
    const top = Array.from({ length: 33 }, (_, i) => 65 - i);
    const bottom = Array.from({ length: 33 }, (_, i) => 32 - i);

    it('ranks both ends', () => {
      expect(engine.rank(top, true)).toBe(7219428434016265739n);
      expect(engine.rank(bottom, true)).toBe(0n);
    });

    it('round-trips sampled ranks', () => {
      for (const r of [0n, 1n, 123456789012345678n, 4000000000000000000n, 7219428434016265739n]) {
        expect(engine.rank(engine.unrank(r), true)).toBe(r);
      }
    });

    it('unranks the last rank to the top tuple', () => {
      expect(engine.unrank(7219428434016265739n)).toEqual(top);
    });

    it('rejects the total itself', () => {
      expect(() => engine.unrank(7219428434016265740n)).toThrow(OutOfRangeError);
    });

    it('agrees with the 32-bit engine where both apply', () => {
      const narrow = CombinadicEngine.int32(13, 5);
      const wide = CombinadicEngine.int64(13, 5);
      for (let r = 0; r < 1287; r += 97) {
        expect(wide.unrank(BigInt(r))).toEqual(narrow.unrank(r));
      }
    });
  });

  describe('createEngine', () => {
    it('defaults to 32 bits', () => {
      const engine = createEngine(13, 5);
      expect(engine.totalCombinations).toBe(1287);
      expect(isWideEngine(engine)).toBe(false);
    });

    it('builds a 64-bit engine by name', () => {
      const engine = createEngine(13, 5, 'int64');
      expect(engine.totalCombinations).toBe(1287n);
      expect(isWideEngine(engine)).toBe(true);
    });
  });
});

describe('parseRank', () => {
  it('parses decimal ranks in the engine width', () => {
    expect(CombinadicEngine.int32(13, 5).parseRank(' 1286 ')).toBe(1286);
    expect(CombinadicEngine.int64(66, 33).parseRank('7219428434016265739')).toBe(7219428434016265739n);
  });

  it('reads negative zero as rank 0', () => {
    const engine = CombinadicEngine.int32(13, 5);
    expect(engine.parseRank('-0')).toBe(0);
    expect(engine.unrank(engine.parseRank('-0'))).toEqual([4, 3, 2, 1, 0]);
  });

  it('rejects text that is not an integer', () => {
    expect(() => CombinadicEngine.int32(13, 5).parseRank('12.5')).toThrow('Rank "12.5" is not an integer');
    expect(() => CombinadicEngine.int64(13, 5).parseRank('abc')).toThrow(OutOfRangeError);
  });

  it('rejects ranks outside the engine', () => {
    expect(() => CombinadicEngine.int32(13, 5).parseRank('1287')).toThrow('Rank 1287 is outside [0, 1287)');
  });
});
