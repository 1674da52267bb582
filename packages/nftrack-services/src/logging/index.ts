export { rootLogger, createServiceLogger, LogPatterns, type ServiceLogger } from './logger.js';
