/**
 * Service Logging
 *
 * Structured logging for nftrack services using Pino.
 */

import { pino, type Logger } from 'pino';

export type ServiceLogger = Logger;

const level = process.env.LOG_LEVEL ?? 'info';

export const rootLogger: ServiceLogger = pino({
  name: 'nftrack',
  level,
  formatters: {
    level: (label) => ({ level: label }),
  },
  timestamp: pino.stdTimeFunctions.isoTime,
});

/**
 * Create a child logger for a service class
 */
export function createServiceLogger(serviceName: string): ServiceLogger {
  return rootLogger.child({ service: serviceName });
}

/**
 * Common structured log patterns for services
 */
export const LogPatterns = {
  methodEntry(logger: ServiceLogger, method: string, params?: Record<string, unknown>): void {
    logger.debug({ method, ...params, msg: `Entering ${method}` });
  },

  methodExit(logger: ServiceLogger, method: string, result?: Record<string, unknown>): void {
    logger.debug({ method, ...result, msg: `Exiting ${method}` });
  },

  dbOperation(
    logger: ServiceLogger,
    operation: string,
    table: string,
    context?: Record<string, unknown>
  ): void {
    logger.debug({ operation, table, ...context, msg: `DB ${operation} on ${table}` });
  },
};
