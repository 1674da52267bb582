export * from './tracker-errors.js';
