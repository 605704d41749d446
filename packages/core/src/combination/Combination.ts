import { InvalidCombinationError, OutOfRangeError } from '../errors.js';

/**
 * A combination as item indices. The canonical form is strictly
 * descending, e.g. [12, 11, 10, 9, 8] for the top 5 of 13.
 */
export type Combination = number[];

/** Sort a tuple into descending order in place */
export function sortDescending(values: number[]): number[] {
  return values.sort((a, b) => b - a);
}

/** True if every value is strictly greater than the one after it */
export function isStrictlyDescending(values: readonly number[]): boolean {
  for (let i = 1; i < values.length; i++) {
    if (values[i - 1] <= values[i]) {
      return false;
    }
  }
  return true;
}

/**
 * Validate a tuple against an N choose K system and return it as a new
 * strictly descending array. The input is never modified.
 *
 * @param alreadySorted - the caller asserts the tuple is descending; it is checked, not sorted
 * @throws {OutOfRangeError} for a wrong length or a value that is not an integer in [0, N)
 * @throws {InvalidCombinationError} for repeated values, or an unsorted tuple asserted as sorted
 */
export function normalizeCombination(
  values: readonly number[],
  itemCount: number,
  groupSize: number,
  alreadySorted: boolean
): Combination {
  if (values.length !== groupSize) {
    throw new OutOfRangeError(`Expected ${groupSize} values, got ${values.length}`);
  }
  for (const value of values) {
    if (!Number.isInteger(value) || value < 0 || value >= itemCount) {
      throw new OutOfRangeError(`Value ${value} is outside [0, ${itemCount})`);
    }
  }

  const result = alreadySorted ? [...values] : sortDescending([...values]);
  if (!isStrictlyDescending(result)) {
    if (alreadySorted && new Set(values).size === values.length) {
      throw new InvalidCombinationError(`Combination [${values.join(', ')}] is not in descending order`);
    }
    throw new InvalidCombinationError(`Combination [${values.join(', ')}] contains duplicate values`);
  }
  return result;
}
