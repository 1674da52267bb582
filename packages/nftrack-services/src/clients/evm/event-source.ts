/**
 * Event Source
 *
 * Contract the tracker consumes to read the chain.
 *
 * Preconditions on fetchLogs():
 * - only mined logs are returned
 * - logs are ordered by block number, then log index
 *
 * Failures are reported as FetchError; transport-level failures as
 * SourceUnavailableError.
 */

import type { LogFilterQuery, RawLog } from '@nftrack/shared';

export interface EventSource {
  currentHead(): Promise<bigint>;
  fetchLogs(query: LogFilterQuery): Promise<RawLog[]>;
}
