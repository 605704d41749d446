import { InvalidArgumentError, OverflowError } from '../errors.js';
import { INT32_MAX, type IntegerWidth, type RankValue } from '../width/IntegerWidth.js';

/**
 * C(n, k) as a plain number, checked against the 32-bit limit.
 *
 * The multiplicative formula n! / (n-k)! / k! is used while both products
 * stay exact in a double; past that the exact {@link binomialWide} value is
 * taken instead. For example, 52 choose 7 gives 133,784,560.
 *
 * This is a convenience for callers; engines size themselves with
 * {@link checkedBinomial}.
 *
 * @throws {InvalidArgumentError} if n or k is not an integer
 * @throws {OverflowError} if the result exceeds 2^31 - 1
 */
export function binomial(n: number, k: number): number {
  if (!Number.isInteger(n) || !Number.isInteger(k)) {
    throw new InvalidArgumentError(`n and k must be integers, got n=${n}, k=${k}`);
  }
  if (k > n || k < 0) return 0;
  if (k === 0) return 1;
  if (k === 1) return checkedNumber(n, k, BigInt(n));

  let product = 1;
  for (let i = n - k + 1; i <= n; i++) {
    product *= i;
  }
  let divisor = 1;
  for (let i = 2; i <= k; i++) {
    divisor *= i;
  }
  if (Number.isSafeInteger(product) && Number.isSafeInteger(divisor)) {
    return checkedNumber(n, k, BigInt(product / divisor));
  }
  return checkedNumber(n, k, binomialWide(n, k));
}

function checkedNumber(n: number, k: number, exact: bigint): number {
  if (exact > INT32_MAX) {
    throw new OverflowError(`${n} choose ${k} does not fit in a 32-bit integer`);
  }
  return Number(exact);
}

/**
 * C(n, k) computed one factor at a time, dividing after every multiply so
 * the intermediate value stays near the final magnitude.
 * Returns 0 when k > n.
 */
export function binomialWide(n: number | bigint, k: number | bigint): bigint {
  let remaining = BigInt(n);
  const groupSize = BigInt(k);
  if (groupSize > remaining || groupSize < 0n) return 0n;

  let result = 1n;
  for (let d = 1n; d <= groupSize; d++) {
    result *= remaining--;
    result /= d;
  }
  return result;
}

/**
 * C(n, k) in the rank type of `width`.
 *
 * @throws {OverflowError} if the exact value exceeds the width's maximum
 */
export function checkedBinomial<R extends RankValue>(n: number, k: number, width: IntegerWidth<R>): R {
  const exact = binomialWide(n, k);
  if (exact > width.max) {
    throw new OverflowError(
      `${n} choose ${k} = ${exact} exceeds the ${width.bits}-bit limit of ${width.max}`
    );
  }
  return width.fromBigInt(exact);
}
