/**
 * Worker Configuration
 *
 * Environment-based configuration for the tracker process.
 */

import { getAddress, isAddress, zeroAddress, type Address } from 'viem';
import { z } from 'zod';
import { ConfigError, parseDurationMs } from '@nftrack/services';
import { createLogger } from './logger.js';

const log = createLogger('Config');

export const DEFAULT_POLL_INTERVAL_MS = 10 * 60 * 1000;
export const DEFAULT_BACKFILL_BATCH_SIZE_BLOCKS = 10_000;
export const DEFAULT_MAX_SOURCE_FAILURES = 10;

export interface WorkerConfig {
  /** JSON-RPC endpoint of the event source (http, https, ws or wss) */
  rpcUrl: string;

  /** Tracked contracts, checksummed and deduplicated */
  contractAddresses: Address[];

  /** First block of the backfill range */
  startBlock: bigint;

  /** Poll interval (ms) */
  pollIntervalMs: number;

  /** Max block span per log query (0 disables chunking) */
  backfillBatchSizeBlocks: number;

  /** Consecutive connection failures before polling gives up */
  maxConsecutiveSourceFailures: number;

  database: {
    url: string;
    authToken?: string;
  };

  api: {
    host: string;
    port: number;
  };

  logLevel: string;
}

type Env = Record<string, string | undefined>;

const contractAddressesSchema = z.array(z.string());

/**
 * Load configuration from environment variables
 *
 * @throws ConfigError if a required variable is missing or malformed
 */
export function loadConfig(env: Env = process.env): WorkerConfig {
  const rpcUrl = requireEnv(env, 'ETH_RPC_ENDPOINT');
  if (!/^(https?|wss?):\/\//i.test(rpcUrl)) {
    throw new ConfigError(
      'ETH_RPC_ENDPOINT must be an HTTP(S) or WebSocket (ws/wss) URL',
      'ETH_RPC_ENDPOINT'
    );
  }

  const authToken = env.DATABASE_AUTH_TOKEN || undefined;

  return {
    rpcUrl,
    contractAddresses: parseContractAddresses(requireEnv(env, 'CONTRACT_ADDRESSES')),
    startBlock: parseStartBlock(requireEnv(env, 'FROM_BLOCK')),
    pollIntervalMs: parsePollInterval(env.FETCH_INTERVAL),
    backfillBatchSizeBlocks: parseNonNegativeInt(
      env,
      'BACKFILL_BATCH_SIZE_BLOCKS',
      DEFAULT_BACKFILL_BATCH_SIZE_BLOCKS
    ),
    maxConsecutiveSourceFailures: Math.max(
      1,
      parseNonNegativeInt(env, 'MAX_SOURCE_FAILURES', DEFAULT_MAX_SOURCE_FAILURES)
    ),
    database: authToken
      ? { url: env.DATABASE_URL || 'file:nftrack.db', authToken }
      : { url: env.DATABASE_URL || 'file:nftrack.db' },
    api: {
      host: env.HOST || 'localhost',
      port: parsePort(env),
    },
    logLevel: env.LOG_LEVEL ?? 'info',
  };
}

/**
 * Require an environment variable or throw
 */
function requireEnv(env: Env, name: string): string {
  const value = env[name]?.trim();
  if (!value) {
    throw new ConfigError(`Missing required environment variable: ${name}`, name);
  }
  return value;
}

/**
 * Parse the CONTRACT_ADDRESSES JSON array. Invalid entries are logged and skipped.
 */
export function parseContractAddresses(raw: string): Address[] {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    throw new ConfigError('CONTRACT_ADDRESSES must be a JSON array of addresses', 'CONTRACT_ADDRESSES');
  }

  const parsed = contractAddressesSchema.safeParse(json);
  if (!parsed.success) {
    throw new ConfigError('CONTRACT_ADDRESSES must be a JSON array of addresses', 'CONTRACT_ADDRESSES');
  }

  const addresses = new Set<Address>();
  for (const entry of parsed.data) {
    const candidate = entry.trim();
    if (!isAddress(candidate, { strict: false }) || getAddress(candidate) === zeroAddress) {
      log.warn({ entry, msg: `Ignoring invalid contract address: ${entry}` });
      continue;
    }
    addresses.add(getAddress(candidate));
  }

  if (addresses.size === 0) {
    throw new ConfigError('CONTRACT_ADDRESSES contains no valid address', 'CONTRACT_ADDRESSES');
  }

  return [...addresses];
}

function parseStartBlock(raw: string): bigint {
  if (!/^\d+$/.test(raw)) {
    throw new ConfigError(`FROM_BLOCK must be a non-negative integer, got "${raw}"`, 'FROM_BLOCK');
  }
  return BigInt(raw);
}

function parsePollInterval(raw: string | undefined): number {
  if (raw === undefined || raw.trim() === '') {
    return DEFAULT_POLL_INTERVAL_MS;
  }

  const ms = parseDurationMs(raw);
  if (ms === null) {
    log.warn({
      value: raw,
      defaultMs: DEFAULT_POLL_INTERVAL_MS,
      msg: `Unparseable FETCH_INTERVAL "${raw}", using default`,
    });
    return DEFAULT_POLL_INTERVAL_MS;
  }

  return ms;
}

function parsePort(env: Env): number {
  const port = parseNonNegativeInt(env, 'PORT', 3000);
  if (port < 1 || port > 65535) {
    throw new ConfigError(`PORT must be between 1 and 65535, got ${port}`, 'PORT');
  }
  return port;
}

function parseNonNegativeInt(env: Env, name: string, fallback: number): number {
  const raw = env[name]?.trim();
  if (!raw) {
    return fallback;
  }
  if (!/^\d+$/.test(raw)) {
    throw new ConfigError(`${name} must be a non-negative integer, got "${raw}"`, name);
  }
  return parseInt(raw, 10);
}
