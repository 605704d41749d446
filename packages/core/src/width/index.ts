export * from './IntegerWidth.js';
