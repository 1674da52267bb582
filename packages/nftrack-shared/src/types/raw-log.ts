/**
 * Raw Log
 *
 * A mined event-log entry as handed over by the event source, before decoding.
 */

import type { Address, Hash, Hex } from 'viem';

export interface RawLog {
  /** Emitting contract */
  address: Address;
  /** topics[0] is the event selector, topics[1..] the indexed parameters */
  topics: readonly Hex[];
  /** ABI-encoded non-indexed parameters */
  data: Hex;
  blockNumber: bigint;
  logIndex: number;
  transactionHash: Hash;
}
