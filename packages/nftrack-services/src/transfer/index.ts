export { TransferLogDecoder } from './transfer-log-decoder.js';
export { FilterQueryPlanner, splitQuery } from './filter-query-planner.js';
