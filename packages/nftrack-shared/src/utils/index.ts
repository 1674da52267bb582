export * from './token-id.js';
