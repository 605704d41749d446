// Combinatorial number system: ranking and unranking of k-combinations

// Errors
export * from './errors.js';

// Integer widths
export * from './width/index.js';

// Binomial coefficients
export * from './binomial/index.js';

// Index tables
export * from './tables/index.js';

// Combination tuples
export * from './combination/index.js';

// Rank / unrank engine
export * from './engine/index.js';
