/**
 * Identifier of the integer width an engine computes in
 */
export type WidthName = 'int32' | 'int64';

/** Rank representation: plain numbers for 32-bit engines, bigints for 64-bit ones */
export type RankValue = number | bigint;

/**
 * Indexable storage for table cells. `Int32Array` and `BigInt64Array`
 * both satisfy it.
 */
export interface NumericBuffer<R extends RankValue> {
  [index: number]: R;
  readonly length: number;
}

/**
 * Arithmetic descriptor for one integer width.
 * The engine, table builder and binomial checks are written once against
 * this interface and instantiated for each width.
 */
export interface IntegerWidth<R extends RankValue> {
  readonly name: WidthName;
  readonly bits: 32 | 64;

  /** Largest representable value (2^31 - 1 or 2^63 - 1) */
  readonly max: bigint;

  readonly zero: R;
  readonly one: R;

  add(a: R, b: R): R;
  subtract(a: R, b: R): R;

  /** Negative, zero or positive like a sort comparator */
  compare(a: R, b: R): number;

  /** Convert an exact value already known to fit */
  fromBigInt(value: bigint): R;
  fromIndex(value: number): R;
  toIndex(value: R): number;

  /** True when `value` is an integer of this width's rank type */
  isRank(value: unknown): value is R;

  /** Parse a decimal string; NaN-like input yields a value `isRank` rejects */
  parse(text: string): R | undefined;

  /** Zero-filled storage for `length` cells */
  allocate(length: number): NumericBuffer<R>;
}

export const INT32_MAX = 2147483647n;
export const INT64_MAX = 9223372036854775807n;

const DECIMAL = /^-?\d+$/;

export const INT32: IntegerWidth<number> = {
  name: 'int32',
  bits: 32,
  max: INT32_MAX,
  zero: 0,
  one: 1,
  add: (a, b) => a + b,
  subtract: (a, b) => a - b,
  compare: (a, b) => a - b,
  fromBigInt: value => Number(value),
  fromIndex: value => value,
  toIndex: value => value,
  isRank: (value): value is number => typeof value === 'number' && Number.isInteger(value),
  // + 0 turns "-0" into 0
  parse: text => (DECIMAL.test(text.trim()) ? Number(text.trim()) + 0 : undefined),
  allocate: length => new Int32Array(length)
};

export const INT64: IntegerWidth<bigint> = {
  name: 'int64',
  bits: 64,
  max: INT64_MAX,
  zero: 0n,
  one: 1n,
  add: (a, b) => a + b,
  subtract: (a, b) => a - b,
  compare: (a, b) => (a < b ? -1 : a > b ? 1 : 0),
  fromBigInt: value => value,
  fromIndex: value => BigInt(value),
  toIndex: value => Number(value),
  isRank: (value): value is bigint => typeof value === 'bigint',
  parse: text => (DECIMAL.test(text.trim()) ? BigInt(text.trim()) : undefined),
  allocate: length => new BigInt64Array(length)
};

/** Look up a width descriptor by name */
export function widthByName(name: WidthName): IntegerWidth<number> | IntegerWidth<bigint> {
  return name === 'int64' ? INT64 : INT32;
}

/** All supported widths */
export const SUPPORTED_WIDTHS: readonly WidthName[] = ['int32', 'int64'];
