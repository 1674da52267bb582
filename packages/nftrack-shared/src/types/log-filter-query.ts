import type { Address, Hex } from 'viem';

/**
 * Immutable description of one log fetch: which contracts, which event, which blocks.
 * Both bounds are inclusive.
 */
export interface LogFilterQuery {
  readonly addresses: readonly Address[];
  readonly topic0: Hex;
  readonly fromBlock: bigint;
  readonly toBlock: bigint;
}
