/**
 * Base error class for the combinadic packages.
 */
export class CombinadicError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CombinadicError';
  }
}

/**
 * Thrown when an engine is constructed with an impossible N/K pair.
 */
export class InvalidArgumentError extends CombinadicError {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidArgumentError';
  }
}

/**
 * Thrown when C(N,K) does not fit the integer width in use.
 */
export class OverflowError extends CombinadicError {
  constructor(message: string) {
    super(message);
    this.name = 'OverflowError';
  }
}

/**
 * Thrown for a rank outside [0, total) or a tuple element outside [0, N).
 */
export class OutOfRangeError extends CombinadicError {
  constructor(message: string) {
    super(message);
    this.name = 'OutOfRangeError';
  }
}

/** Thrown for tuples with repeated values, or unsorted tuples passed as sorted. */
export class InvalidCombinationError extends CombinadicError {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidCombinationError';
  }
}
