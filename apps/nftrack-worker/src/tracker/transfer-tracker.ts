/**
 * Transfer Tracker
 *
 * Orchestrates the tracking lifecycle:
 *
 *   initializing -> backfilling -> polling -> stopped
 *
 * Backfill replays [startBlock, head] once; any failure there is fatal. Polling
 * then fetches (cursor, head] on every tick. A failed tick leaves the cursor where
 * it was so the next tick retries the range, widened to the new head.
 *
 * Logs are applied strictly in source order. A log that cannot be decoded or
 * stored is logged and skipped; the rest of the batch still applies.
 */

import {
  ConfigError,
  ConnectionError,
  DecodeError,
  FilterQueryPlanner,
  SourceUnavailableError,
  StoreError,
  TokenIdRangeError,
  TransferLogDecoder,
  applyTransferFact,
  errorMessage,
  splitQuery,
  type EventSource,
  type LogFilterQuery,
  type OwnershipStore,
  type RawLog,
} from '@nftrack/services';
import { createLogger, trackerLog, type LogSkipReason } from '../logger.js';
import { CoalescingTicker } from './coalescing-ticker.js';

export type TrackerState = 'initializing' | 'backfilling' | 'polling' | 'stopped';

export interface TransferTrackerOptions {
  source: EventSource;
  store: OwnershipStore;
  contractAddresses: readonly string[];
  startBlock: bigint;
  pollIntervalMs: number;
  /** Max block span per log query; 0 disables chunking. Default 10000 */
  batchSizeBlocks?: number;
  /** Consecutive SourceUnavailableErrors before polling gives up. Default 10 */
  maxConsecutiveSourceFailures?: number;
  decoder?: TransferLogDecoder;
  /** Clock for observedAt */
  now?: () => Date;
}

export interface BatchResult {
  fromBlock: bigint;
  toBlock: bigint;
  logCount: number;
  upserted: number;
  skipped: number;
}

export type PollOutcome =
  | { status: 'empty'; head: bigint }
  | { status: 'processed'; batches: BatchResult[] }
  | { status: 'failed'; error: unknown; batches: BatchResult[] };

export interface TrackerStatus {
  state: TrackerState;
  cursor: bigint | null;
  logsDecoded: number;
  factsUpserted: number;
  logsSkipped: number;
  ticks: number;
  failedTicks: number;
  coalescedTicks: number;
  consecutiveSourceFailures: number;
}

const DEFAULT_BATCH_SIZE_BLOCKS = 10_000;
const DEFAULT_MAX_CONSECUTIVE_SOURCE_FAILURES = 10;

export class TransferTracker {
  private readonly log = createLogger('TransferTracker');
  private readonly source: EventSource;
  private readonly store: OwnershipStore;
  private readonly contractAddresses: readonly string[];
  private readonly startBlock: bigint;
  private readonly pollIntervalMs: number;
  private readonly batchSizeBlocks: number;
  private readonly maxConsecutiveSourceFailures: number;
  private readonly decoder: TransferLogDecoder;
  private readonly now: () => Date;

  private state: TrackerState = 'initializing';
  private cursor: bigint | null = null;
  private planner: FilterQueryPlanner | null = null;
  private ticker: CoalescingTicker | null = null;
  private runStarted = false;
  private consecutiveSourceFailures = 0;
  private readonly counters = {
    logsDecoded: 0,
    factsUpserted: 0,
    logsSkipped: 0,
    ticks: 0,
    failedTicks: 0,
  };

  constructor(options: TransferTrackerOptions) {
    this.source = options.source;
    this.store = options.store;
    this.contractAddresses = options.contractAddresses;
    this.startBlock = options.startBlock;
    this.pollIntervalMs = options.pollIntervalMs;
    this.batchSizeBlocks = options.batchSizeBlocks ?? DEFAULT_BATCH_SIZE_BLOCKS;
    this.maxConsecutiveSourceFailures =
      options.maxConsecutiveSourceFailures ?? DEFAULT_MAX_CONSECUTIVE_SOURCE_FAILURES;
    this.decoder = options.decoder ?? new TransferLogDecoder();
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Backfill, then poll until the signal aborts.
   *
   * @throws ConfigError if the contract set is empty or invalid
   * @throws ConnectionError if the source cannot be reached during backfill, or
   *   stays unreachable for maxConsecutiveSourceFailures ticks while polling
   */
  async run(signal?: AbortSignal): Promise<void> {
    if (this.runStarted) {
      throw new Error('TransferTracker.run() can only be called once');
    }
    this.runStarted = true;

    trackerLog.lifecycle(this.log, 'starting', {
      startBlock: this.startBlock.toString(),
      pollIntervalMs: this.pollIntervalMs,
      batchSizeBlocks: this.batchSizeBlocks,
    });

    try {
      await this.backfill(signal);

      if (signal?.aborted) {
        return;
      }

      await this.poll(signal);
    } catch (error) {
      trackerLog.lifecycle(this.log, 'error', { error: errorMessage(error) });
      throw error;
    } finally {
      this.ticker?.stop();
      this.setState('stopped');
      trackerLog.lifecycle(this.log, 'stopped', { cursor: this.cursor?.toString() ?? null });
    }
  }

  /**
   * Replay [startBlock, head] once and set the cursor to that head.
   * An abort is honoured between chunks; the cursor then stays unset.
   */
  async backfill(signal?: AbortSignal): Promise<BatchResult[]> {
    const planner = this.getPlanner();
    this.setState('backfilling');

    let head: bigint;
    try {
      head = await this.source.currentHead();
    } catch (error) {
      throw new ConnectionError(`Cannot reach event source: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    const query = planner.backfillQuery(this.startBlock, head);
    if (!query) {
      this.cursor = this.startBlock - 1n;
      this.log.info({
        startBlock: this.startBlock.toString(),
        head: head.toString(),
        msg: 'Start block is beyond the chain head, nothing to backfill',
      });
      return [];
    }

    const batches: BatchResult[] = [];
    for (const chunk of splitQuery(query, this.batchSizeBlocks)) {
      let logs: RawLog[];
      try {
        logs = await this.source.fetchLogs(chunk);
      } catch (error) {
        throw new ConnectionError(
          `Backfill failed for blocks ${chunk.fromBlock}-${chunk.toBlock}: ${errorMessage(error)}`,
          { cause: error }
        );
      }
      batches.push(await this.applyLogs(chunk, logs));

      if (signal?.aborted) {
        this.log.info({
          toBlock: chunk.toBlock.toString(),
          msg: 'Backfill aborted, cursor not set',
        });
        return batches;
      }
    }

    this.cursor = head;
    this.log.info({
      cursor: head.toString(),
      batches: batches.length,
      msg: `Backfill complete up to block ${head}`,
    });
    return batches;
  }

  /**
   * One poll tick: fetch (cursor, head] and apply it.
   * The cursor advances past each fully applied chunk. Fetch failures leave it in place.
   *
   * @throws ConnectionError once SourceUnavailableErrors reach the configured limit
   */
  async pollOnce(): Promise<PollOutcome> {
    const cursor = this.requireCursor();
    const planner = this.getPlanner();
    this.counters.ticks++;

    let head: bigint;
    try {
      head = await this.source.currentHead();
    } catch (error) {
      this.handleFetchFailure(error);
      return { status: 'failed', error, batches: [] };
    }

    const query = planner.pollQuery(cursor, head);
    if (!query) {
      this.consecutiveSourceFailures = 0;
      this.log.debug({ cursor: cursor.toString(), head: head.toString(), msg: 'No new blocks' });
      return { status: 'empty', head };
    }

    const batches: BatchResult[] = [];
    for (const chunk of splitQuery(query, this.batchSizeBlocks)) {
      let logs: RawLog[];
      try {
        logs = await this.source.fetchLogs(chunk);
      } catch (error) {
        this.handleFetchFailure(error);
        return { status: 'failed', error, batches };
      }

      batches.push(await this.applyLogs(chunk, logs));
      this.cursor = chunk.toBlock;
    }

    this.consecutiveSourceFailures = 0;
    return { status: 'processed', batches };
  }

  getState(): TrackerState {
    return this.state;
  }

  /** Last block whose logs have all been applied, or null before backfill completes */
  getCursor(): bigint | null {
    return this.cursor;
  }

  getStatus(): TrackerStatus {
    return {
      state: this.state,
      cursor: this.cursor,
      ...this.counters,
      coalescedTicks: this.ticker?.getDroppedTicks() ?? 0,
      consecutiveSourceFailures: this.consecutiveSourceFailures,
    };
  }

  private async poll(signal?: AbortSignal): Promise<void> {
    const ticker = new CoalescingTicker(this.pollIntervalMs);
    this.ticker = ticker;
    this.setState('polling');
    ticker.start();
    trackerLog.lifecycle(this.log, 'started', { cursor: this.cursor?.toString() ?? null });

    while (await ticker.next(signal)) {
      await this.pollOnce();
    }

    trackerLog.lifecycle(this.log, 'stopping');
  }

  private async applyLogs(query: LogFilterQuery, logs: readonly RawLog[]): Promise<BatchResult> {
    let upserted = 0;
    let skipped = 0;

    for (const log of logs) {
      try {
        const fact = this.decoder.decode(log);
        this.counters.logsDecoded++;
        await applyTransferFact(this.store, fact, this.now());
        upserted++;
      } catch (error) {
        skipped++;
        trackerLog.logSkipped(this.log, skipReason(error), error, log);
      }
    }

    this.counters.factsUpserted += upserted;
    this.counters.logsSkipped += skipped;

    const result: BatchResult = {
      fromBlock: query.fromBlock,
      toBlock: query.toBlock,
      logCount: logs.length,
      upserted,
      skipped,
    };
    trackerLog.batchProcessed(
      this.log,
      result.fromBlock,
      result.toBlock,
      result.logCount,
      result.upserted,
      result.skipped
    );
    return result;
  }

  private handleFetchFailure(error: unknown): void {
    this.counters.failedTicks++;

    if (error instanceof SourceUnavailableError) {
      this.consecutiveSourceFailures++;
    } else {
      this.consecutiveSourceFailures = 0;
    }

    trackerLog.fetchFailed(this.log, error, this.requireCursor(), this.consecutiveSourceFailures);

    if (this.consecutiveSourceFailures >= this.maxConsecutiveSourceFailures) {
      throw new ConnectionError(
        `Event source unreachable for ${this.consecutiveSourceFailures} consecutive ticks`,
        { cause: error }
      );
    }
  }

  private getPlanner(): FilterQueryPlanner {
    if (!this.planner) {
      try {
        this.planner = new FilterQueryPlanner(this.contractAddresses, this.decoder.topic0);
      } catch (error) {
        throw new ConfigError(`Invalid contract addresses: ${errorMessage(error)}`, 'CONTRACT_ADDRESSES');
      }
    }
    return this.planner;
  }

  private requireCursor(): bigint {
    if (this.cursor === null) {
      throw new Error('Backfill has not completed, no cursor yet');
    }
    return this.cursor;
  }

  private setState(next: TrackerState): void {
    if (next === this.state) {
      return;
    }
    trackerLog.stateChange(this.log, this.state, next);
    this.state = next;
  }
}

function skipReason(error: unknown): LogSkipReason {
  if (error instanceof DecodeError) return 'decode';
  if (error instanceof TokenIdRangeError) return 'token-id-range';
  if (error instanceof StoreError) return 'store';
  return 'unexpected';
}
