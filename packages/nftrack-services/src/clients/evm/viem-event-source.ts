/**
 * Viem Event Source
 *
 * EventSource over a viem PublicClient using raw eth_getLogs calls, so that
 * decoding stays in TransferLogDecoder.
 */

import {
  BaseError,
  HttpRequestError,
  SocketClosedError,
  TimeoutError,
  WebSocketRequestError,
  createPublicClient,
  getAddress,
  hexToBigInt,
  hexToNumber,
  http,
  numberToHex,
  type PublicClient,
  type RpcLog,
  webSocket,
} from 'viem';
import {
  FetchError,
  SourceUnavailableError,
  errorMessage,
  type FetchOperation,
  type LogFilterQuery,
  type RawLog,
} from '@nftrack/shared';
import { LogPatterns, createServiceLogger, type ServiceLogger } from '../../logging/index.js';
import type { EventSource } from './event-source.js';

const RETRY = { retryCount: 3, retryDelay: 1000 } as const;

/**
 * Create a public client for an RPC endpoint.
 * ws:// and wss:// URLs use the WebSocket transport, anything else HTTP.
 */
export function createEvmPublicClient(rpcUrl: string): PublicClient {
  return createPublicClient({
    transport: /^wss?:\/\//i.test(rpcUrl) ? webSocket(rpcUrl, RETRY) : http(rpcUrl, RETRY),
  });
}

/**
 * Check whether a failure happened below the JSON-RPC layer
 * (connection refused, socket closed, request timed out).
 */
export function isTransportError(error: unknown): boolean {
  if (!(error instanceof BaseError)) {
    return false;
  }

  const transportError = error.walk(
    (cause) =>
      cause instanceof HttpRequestError ||
      cause instanceof WebSocketRequestError ||
      cause instanceof SocketClosedError ||
      cause instanceof TimeoutError
  );

  // HTTP status responses are the provider answering, not a lost connection
  if (transportError instanceof HttpRequestError && transportError.status !== undefined) {
    return false;
  }

  return transportError !== null;
}

function compareLogs(a: RawLog, b: RawLog): number {
  if (a.blockNumber !== b.blockNumber) {
    return a.blockNumber < b.blockNumber ? -1 : 1;
  }
  return a.logIndex - b.logIndex;
}

export class ViemEventSource implements EventSource {
  private readonly client: PublicClient;
  private readonly logger: ServiceLogger;

  constructor(client: PublicClient) {
    this.client = client;
    this.logger = createServiceLogger('ViemEventSource');
  }

  async currentHead(): Promise<bigint> {
    try {
      return await this.client.getBlockNumber({ cacheTime: 0 });
    } catch (error) {
      throw this.toFetchError('currentHead', 'Failed to read chain head', error);
    }
  }

  async fetchLogs(query: LogFilterQuery): Promise<RawLog[]> {
    LogPatterns.methodEntry(this.logger, 'fetchLogs', {
      fromBlock: query.fromBlock.toString(),
      toBlock: query.toBlock.toString(),
      addresses: query.addresses.length,
    });

    let rpcLogs: RpcLog[];

    try {
      rpcLogs = await this.client.request({
        method: 'eth_getLogs',
        params: [
          {
            address: [...query.addresses],
            topics: [query.topic0],
            fromBlock: numberToHex(query.fromBlock),
            toBlock: numberToHex(query.toBlock),
          },
        ],
      });
    } catch (error) {
      throw this.toFetchError(
        'fetchLogs',
        `Failed to fetch logs for blocks ${query.fromBlock}-${query.toBlock}`,
        error
      );
    }

    const logs: RawLog[] = [];
    let pending = 0;

    for (const rpcLog of rpcLogs) {
      if (rpcLog.blockNumber === null || rpcLog.logIndex === null || rpcLog.transactionHash === null) {
        pending++;
        continue;
      }

      logs.push({
        address: getAddress(rpcLog.address),
        topics: rpcLog.topics,
        data: rpcLog.data,
        blockNumber: hexToBigInt(rpcLog.blockNumber),
        logIndex: hexToNumber(rpcLog.logIndex),
        transactionHash: rpcLog.transactionHash,
      });
    }

    if (pending > 0) {
      this.logger.debug({ pending, msg: 'Dropped pending logs without block number' });
    }

    const ordered = logs.every((log, i) => i === 0 || compareLogs(logs[i - 1], log) <= 0);
    if (!ordered) {
      this.logger.warn({
        fromBlock: query.fromBlock.toString(),
        toBlock: query.toBlock.toString(),
        msg: 'Source returned logs out of order, sorting by block and log index',
      });
      logs.sort(compareLogs);
    }

    LogPatterns.methodExit(this.logger, 'fetchLogs', { count: logs.length });
    return logs;
  }

  private toFetchError(operation: FetchOperation, message: string, error: unknown): FetchError {
    const detail = `${message}: ${errorMessage(error)}`;

    if (isTransportError(error)) {
      return new SourceUnavailableError(detail, operation, { cause: error });
    }
    return new FetchError(detail, operation, { cause: error });
  }
}
