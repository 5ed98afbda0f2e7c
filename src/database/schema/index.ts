export * from './copyTrading.js';
