/**
 * Filter Query Planner
 *
 * Builds immutable log queries for the tracked contract set and event selector.
 * An inverted range (fromBlock > toBlock) is reported as `null`: nothing to fetch.
 */

import { getAddress, type Address, type Hex } from 'viem';
import type { LogFilterQuery } from '@nftrack/shared';

export class FilterQueryPlanner {
  readonly addresses: readonly Address[];
  readonly topic0: Hex;

  constructor(contractAddresses: Iterable<string>, topic0: Hex) {
    const unique = new Set<Address>();
    for (const address of contractAddresses) {
      unique.add(getAddress(address));
    }

    if (unique.size === 0) {
      throw new Error('At least one contract address is required');
    }

    this.addresses = Object.freeze([...unique]);
    this.topic0 = topic0;
  }

  /**
   * Query for the historical range [startBlock, head].
   */
  backfillQuery(startBlock: bigint, head: bigint): LogFilterQuery | null {
    return this.build(startBlock, head);
  }

  /**
   * Query for everything after the cursor, up to head.
   */
  pollQuery(cursor: bigint, head: bigint): LogFilterQuery | null {
    return this.build(cursor + 1n, head);
  }

  build(fromBlock: bigint, toBlock: bigint): LogFilterQuery | null {
    if (fromBlock < 0n) {
      throw new Error(`fromBlock must not be negative: ${fromBlock.toString()}`);
    }

    if (fromBlock > toBlock) {
      return null;
    }

    return Object.freeze({
      addresses: this.addresses,
      topic0: this.topic0,
      fromBlock,
      toBlock,
    });
  }
}

/**
 * Split a query into consecutive sub-queries spanning at most `maxBlocks` blocks each.
 * `maxBlocks <= 0` returns the query unchanged.
 */
export function splitQuery(query: LogFilterQuery, maxBlocks: number): LogFilterQuery[] {
  if (maxBlocks <= 0) {
    return [query];
  }

  const span = BigInt(maxBlocks);
  const chunks: LogFilterQuery[] = [];

  for (let start = query.fromBlock; start <= query.toBlock; start += span) {
    const end = start + span - 1n > query.toBlock ? query.toBlock : start + span - 1n;
    chunks.push(Object.freeze({ ...query, fromBlock: start, toBlock: end }));
  }

  return chunks;
}
