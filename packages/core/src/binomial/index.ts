export * from './Binomial.js';
