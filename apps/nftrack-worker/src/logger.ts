/**
 * Worker Logger
 *
 * Structured logging for the tracker process, on top of the Pino root logger
 * from @nftrack/services.
 */

import { createServiceLogger, errorMessage, type ServiceLogger } from '@nftrack/services';

export const workerLogger = createServiceLogger('NftrackWorker');

/**
 * Create a child logger with a specific component name
 */
export function createLogger(component: string): ServiceLogger {
  return workerLogger.child({ component });
}

export type LogSkipReason = 'decode' | 'token-id-range' | 'store' | 'unexpected';

/**
 * Structured log helpers for tracker events
 */
export const trackerLog = {
  lifecycle(
    log: ServiceLogger,
    event: 'starting' | 'started' | 'stopping' | 'stopped' | 'error',
    metadata?: Record<string, unknown>
  ): void {
    const level = event === 'error' ? 'error' : 'info';
    log[level]({ event, ...metadata, msg: `Tracker ${event}` });
  },

  stateChange(log: ServiceLogger, from: string, to: string): void {
    log.info({ from, to, msg: `State ${from} -> ${to}` });
  },

  batchProcessed(
    log: ServiceLogger,
    fromBlock: bigint,
    toBlock: bigint,
    logCount: number,
    upserted: number,
    skipped: number
  ): void {
    log.info({
      fromBlock: fromBlock.toString(),
      toBlock: toBlock.toString(),
      logCount,
      upserted,
      skipped,
      msg: `Blocks ${fromBlock}-${toBlock}: ${upserted}/${logCount} upserted, ${skipped} skipped`,
    });
  },

  logSkipped(
    log: ServiceLogger,
    reason: LogSkipReason,
    error: unknown,
    position: { blockNumber: bigint; logIndex: number; transactionHash: string }
  ): void {
    log.warn({
      reason,
      error: errorMessage(error),
      blockNumber: position.blockNumber.toString(),
      logIndex: position.logIndex,
      transactionHash: position.transactionHash,
      msg: `Skipped log ${position.transactionHash}:${position.logIndex} (${reason})`,
    });
  },

  fetchFailed(
    log: ServiceLogger,
    error: unknown,
    cursor: bigint,
    consecutiveSourceFailures: number
  ): void {
    log.error({
      error: errorMessage(error),
      errorName: error instanceof Error ? error.name : typeof error,
      cursor: cursor.toString(),
      consecutiveSourceFailures,
      msg: 'Poll fetch failed, cursor not advanced',
    });
  },
};
