/**
 * Ownership Record Types
 *
 * Domain view of a token's current owner. Independent of the storage encoding
 * (see @nftrack/database for the table definition).
 */

import type { Address, Hash } from 'viem';

export interface OwnershipRecord {
  /** Unique key; set on first insertion, never changed */
  tokenId: number;
  ownerAddress: Address;
  contractAddress: Address;
  lastTxHash: Hash;
  observedAt: Date;
}

/**
 * Input for a keyed insert-or-replace.
 */
export interface UpsertOwnershipInput {
  tokenId: number;
  ownerAddress: Address;
  contractAddress: Address;
  txHash: Hash;
  observedAt: Date;
}

export type TokenIdSortOrder = 'asc' | 'desc';

export interface FindOwnershipOptions {
  /** Defaults to 'desc' */
  order?: TokenIdSortOrder;
}
