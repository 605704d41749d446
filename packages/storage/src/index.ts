// Text export of ranked combinations
export * from './CombinationExport.js';

// Rank-addressed payload tables
export * from './RankedTable.js';
