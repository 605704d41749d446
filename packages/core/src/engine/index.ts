export * from './CombinadicEngine.js';
