export { parseDurationMs } from './duration.js';
