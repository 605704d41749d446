export * from './IndexTables.js';
