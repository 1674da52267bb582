import type { Address } from 'viem';
import type {
  FindOwnershipOptions,
  OwnershipRecord,
  UpsertOwnershipInput,
} from '@nftrack/shared';

/**
 * Ownership Store
 *
 * Keyed persistence for current token owners. upsert() must be a single atomic
 * insert-or-replace per token id, so concurrent readers never see a half-written
 * record. Failures surface as StoreError.
 */
export interface OwnershipStore {
  upsert(input: UpsertOwnershipInput): Promise<void>;
  findAll(options?: FindOwnershipOptions): Promise<OwnershipRecord[]>;
  findByOwner(ownerAddress: Address, options?: FindOwnershipOptions): Promise<OwnershipRecord[]>;
}
