/**
 * Tracker Errors
 *
 * Error taxonomy shared by the services and the worker.
 *
 * - ConfigError: required configuration missing or malformed (fatal at startup)
 * - ConnectionError: the event source cannot be reached (fatal)
 * - FetchError: one head lookup or log fetch failed (tick is retried)
 * - SourceUnavailableError: transport-level FetchError (counts towards ConnectionError)
 * - DecodeError: a log does not match the tracked event shape (log skipped)
 * - TokenIdRangeError: token id does not fit the store key (fact skipped)
 * - StoreError: the ownership upsert failed (fact skipped)
 */

// =============================================================================
// Base
// =============================================================================

export type NftrackErrorCode =
  | 'CONFIG_ERROR'
  | 'CONNECTION_ERROR'
  | 'FETCH_ERROR'
  | 'SOURCE_UNAVAILABLE'
  | 'DECODE_ERROR'
  | 'STORE_ERROR';

export class NftrackError extends Error {
  constructor(
    message: string,
    public readonly code: NftrackErrorCode,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'NftrackError';
  }
}

// =============================================================================
// Startup / connection
// =============================================================================

export class ConfigError extends NftrackError {
  constructor(
    message: string,
    public readonly variable?: string
  ) {
    super(message, 'CONFIG_ERROR');
    this.name = 'ConfigError';
  }
}

export class ConnectionError extends NftrackError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'CONNECTION_ERROR', options);
    this.name = 'ConnectionError';
  }
}

// =============================================================================
// Fetch
// =============================================================================

export type FetchOperation = 'currentHead' | 'fetchLogs';

export class FetchError extends NftrackError {
  constructor(
    message: string,
    public readonly operation: FetchOperation,
    options?: { cause?: unknown; code?: 'FETCH_ERROR' | 'SOURCE_UNAVAILABLE' }
  ) {
    super(message, options?.code ?? 'FETCH_ERROR', { cause: options?.cause });
    this.name = 'FetchError';
  }
}

export class SourceUnavailableError extends FetchError {
  constructor(message: string, operation: FetchOperation, options?: { cause?: unknown }) {
    super(message, operation, { cause: options?.cause, code: 'SOURCE_UNAVAILABLE' });
    this.name = 'SourceUnavailableError';
  }
}

// =============================================================================
// Per-log
// =============================================================================

export class DecodeError extends NftrackError {
  constructor(
    message: string,
    public readonly transactionHash?: string,
    public readonly logIndex?: number,
    options?: { cause?: unknown }
  ) {
    super(message, 'DECODE_ERROR', options);
    this.name = 'DecodeError';
  }
}

/**
 * Raised when a token id cannot be represented by the store key.
 * Extends the built-in RangeError so callers can match either.
 */
export class TokenIdRangeError extends RangeError {
  constructor(
    public readonly tokenId: bigint,
    public readonly maxTokenId: bigint
  ) {
    super(`Token id ${tokenId.toString()} is outside the storable range [0, ${maxTokenId.toString()}]`);
    this.name = 'TokenIdRangeError';
  }
}

export class StoreError extends NftrackError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'STORE_ERROR', options);
    this.name = 'StoreError';
  }
}

// =============================================================================
// Helpers
// =============================================================================

/**
 * Convert unknown error to a loggable message
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
