import type { Address, Hash } from 'viem';

/**
 * A decoded ERC-721 Transfer.
 *
 * Ephemeral: produced by the decoder for one log and consumed once by the tracker.
 */
export interface TransferFact {
  tokenId: bigint;
  from: Address;
  to: Address;
  contractAddress: Address;
  txHash: Hash;
  blockNumber: bigint;
  logIndex: number;
}
