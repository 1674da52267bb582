export * from './raw-log.js';
export * from './transfer-fact.js';
export * from './ownership-record.js';
export * from './log-filter-query.js';
