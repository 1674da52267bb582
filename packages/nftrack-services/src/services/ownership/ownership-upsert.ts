import { toStoreTokenId, type TransferFact, type UpsertOwnershipInput } from '@nftrack/shared';
import type { OwnershipStore } from './ownership-store.js';

/**
 * Build the store input for a transfer: the receiver becomes the owner.
 *
 * @throws TokenIdRangeError if the token id does not fit the store key
 */
export function toUpsertOwnershipInput(fact: TransferFact, observedAt: Date): UpsertOwnershipInput {
  return {
    tokenId: toStoreTokenId(fact.tokenId),
    ownerAddress: fact.to,
    contractAddress: fact.contractAddress,
    txHash: fact.txHash,
    observedAt,
  };
}

/**
 * Apply one transfer to the store. Re-applying the same fact with the same
 * timestamp yields the same record.
 *
 * @throws TokenIdRangeError if the token id does not fit the store key
 * @throws StoreError if the store rejects the write
 */
export async function applyTransferFact(
  store: OwnershipStore,
  fact: TransferFact,
  observedAt: Date
): Promise<UpsertOwnershipInput> {
  const input = toUpsertOwnershipInput(fact, observedAt);
  await store.upsert(input);
  return input;
}
