/**
 * ViemEventSource Unit Tests
 *
 * Runs a real viem PublicClient over an in-process custom transport, so the
 * JSON-RPC shapes and error classes are the ones viem produces.
 */

import { describe, it, expect, vi } from 'vitest';
import { HttpRequestError, createPublicClient, custom, numberToHex, type PublicClient } from 'viem';
import { FetchError, SourceUnavailableError, type LogFilterQuery } from '@nftrack/shared';
import { ViemEventSource, createEvmPublicClient, isTransportError } from './viem-event-source.js';
import {
  CONTRACT_A,
  OWNER_X,
  TRANSFER_TOPIC0,
  addressTopic,
  tokenIdTopic,
  txHash,
  ZERO_ADDRESS,
} from '../../transfer/test-fixtures.js';

type RequestHandler = (args: { method: string; params?: unknown }) => Promise<unknown>;

function createTestClient(handler: RequestHandler): PublicClient {
  return createPublicClient({
    transport: custom({ request: handler }, { retryCount: 0 }),
  });
}

function rpcLog(blockNumber: number, logIndex: number, tokenId: bigint) {
  return {
    address: CONTRACT_A.toLowerCase(),
    topics: [TRANSFER_TOPIC0, addressTopic(ZERO_ADDRESS), addressTopic(OWNER_X), tokenIdTopic(tokenId)],
    data: '0x',
    blockNumber: numberToHex(blockNumber),
    blockHash: txHash(blockNumber + 1000),
    transactionHash: txHash(blockNumber),
    transactionIndex: '0x0',
    logIndex: numberToHex(logIndex),
    removed: false,
  };
}

const QUERY: LogFilterQuery = {
  addresses: [CONTRACT_A],
  topic0: TRANSFER_TOPIC0,
  fromBlock: 100n,
  toBlock: 105n,
};

describe('ViemEventSource', () => {
  describe('currentHead', () => {
    it('should return the latest block number', async () => {
      const source = new ViemEventSource(
        createTestClient(async ({ method }) => (method === 'eth_blockNumber' ? '0x69' : null))
      );

      await expect(source.currentHead()).resolves.toBe(105n);
    });

    it('should not cache the head between calls', async () => {
      const heads = ['0x69', '0x6e'];
      const source = new ViemEventSource(createTestClient(async () => heads.shift()));

      expect(await source.currentHead()).toBe(105n);
      expect(await source.currentHead()).toBe(110n);
    });

    it('should report a lost connection as SourceUnavailableError', async () => {
      const source = new ViemEventSource(
        createTestClient(async () => {
          throw new HttpRequestError({ url: 'http://localhost:8545', details: 'fetch failed' });
        })
      );

      const error = await source.currentHead().catch((e: unknown) => e);

      expect(error).toBeInstanceOf(SourceUnavailableError);
      if (error instanceof SourceUnavailableError) {
        expect(error.operation).toBe('currentHead');
        expect(error.code).toBe('SOURCE_UNAVAILABLE');
      }
    });
  });

  describe('fetchLogs', () => {
    it('should send an eth_getLogs filter with hex block bounds', async () => {
      const handler = vi.fn<RequestHandler>(async () => []);
      const source = new ViemEventSource(createTestClient(handler));

      await source.fetchLogs(QUERY);

      expect(handler).toHaveBeenCalledTimes(1);
      expect(handler.mock.calls[0][0]).toEqual({
        method: 'eth_getLogs',
        params: [
          {
            address: [CONTRACT_A],
            topics: [TRANSFER_TOPIC0],
            fromBlock: '0x64',
            toBlock: '0x69',
          },
        ],
      });
    });

    it('should map RPC logs to raw logs', async () => {
      const source = new ViemEventSource(createTestClient(async () => [rpcLog(101, 2, 7n)]));

      const logs = await source.fetchLogs(QUERY);

      expect(logs).toEqual([
        {
          address: CONTRACT_A,
          topics: [
            TRANSFER_TOPIC0,
            addressTopic(ZERO_ADDRESS),
            addressTopic(OWNER_X),
            tokenIdTopic(7n),
          ],
          data: '0x',
          blockNumber: 101n,
          logIndex: 2,
          transactionHash: txHash(101),
        },
      ]);
    });

    it('should drop pending logs', async () => {
      const pending = { ...rpcLog(0, 0, 1n), blockNumber: null, logIndex: null };
      const source = new ViemEventSource(
        createTestClient(async () => [rpcLog(101, 0, 7n), pending])
      );

      const logs = await source.fetchLogs(QUERY);

      expect(logs.map((l) => l.blockNumber)).toEqual([101n]);
    });

    it('should restore block and log index order', async () => {
      const source = new ViemEventSource(
        createTestClient(async () => [rpcLog(104, 1, 9n), rpcLog(101, 3, 7n), rpcLog(104, 0, 8n)])
      );

      const logs = await source.fetchLogs(QUERY);

      expect(logs.map((l) => [l.blockNumber, l.logIndex])).toEqual([
        [101n, 3],
        [104n, 0],
        [104n, 1],
      ]);
    });

    it('should report provider errors as FetchError', async () => {
      const source = new ViemEventSource(
        createTestClient(async () => {
          throw new Error('query returned more than 10000 results');
        })
      );

      const error = await source.fetchLogs(QUERY).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(FetchError);
      expect(error).not.toBeInstanceOf(SourceUnavailableError);
      if (error instanceof FetchError) {
        expect(error.operation).toBe('fetchLogs');
        expect(error.message).toContain('Failed to fetch logs for blocks 100-105');
      }
    });
  });
});

describe('isTransportError', () => {
  it('should match request failures without an HTTP status', () => {
    expect(isTransportError(new HttpRequestError({ url: 'http://localhost:8545' }))).toBe(true);
  });

  it('should not match HTTP status responses', () => {
    expect(isTransportError(new HttpRequestError({ url: 'http://localhost:8545', status: 429 }))).toBe(
      false
    );
  });

  it('should not match plain errors', () => {
    expect(isTransportError(new Error('boom'))).toBe(false);
  });
});

describe('createEvmPublicClient', () => {
  it('should use HTTP for http(s) endpoints', () => {
    expect(createEvmPublicClient('https://rpc.example.test').transport.type).toBe('http');
  });

  it('should use WebSocket for ws(s) endpoints', () => {
    expect(createEvmPublicClient('wss://rpc.example.test').transport.type).toBe('webSocket');
    expect(createEvmPublicClient('ws://localhost:8546').transport.type).toBe('webSocket');
  });
});
