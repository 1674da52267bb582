export * from './evm/index.js';
