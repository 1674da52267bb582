/**
 * OwnershipService
 *
 * OwnershipStore backed by the drizzle ownership_records table.
 *
 * upsert() is one INSERT ... ON CONFLICT(token_id) DO UPDATE statement:
 * owner, contract, tx hash and timestamp are replaced wholesale, the key is
 * left untouched. No block/log ordering is compared against the stored row,
 * so the last applied fact wins.
 */

import { asc, desc, eq } from 'drizzle-orm';
import type { Address } from 'viem';
import { ownershipRecords, type Db, type OwnershipRecordRow } from '@nftrack/database';
import {
  StoreError,
  errorMessage,
  type FindOwnershipOptions,
  type OwnershipRecord,
  type UpsertOwnershipInput,
} from '@nftrack/shared';
import { createServiceLogger, LogPatterns, type ServiceLogger } from '../../logging/index.js';
import type { OwnershipStore } from './ownership-store.js';

const TABLE = 'ownership_records';

export class OwnershipService implements OwnershipStore {
  private readonly db: Db;
  private readonly logger: ServiceLogger;

  constructor(deps: { db: Db }) {
    this.db = deps.db;
    this.logger = createServiceLogger('OwnershipService');
  }

  async upsert(input: UpsertOwnershipInput): Promise<void> {
    LogPatterns.dbOperation(this.logger, 'upsert', TABLE, { tokenId: input.tokenId });

    try {
      await this.db
        .insert(ownershipRecords)
        .values({
          tokenId: input.tokenId,
          ownerAddress: input.ownerAddress,
          contractAddress: input.contractAddress,
          lastTxHash: input.txHash,
          observedAt: input.observedAt,
        })
        .onConflictDoUpdate({
          target: ownershipRecords.tokenId,
          set: {
            ownerAddress: input.ownerAddress,
            contractAddress: input.contractAddress,
            lastTxHash: input.txHash,
            observedAt: input.observedAt,
          },
        });
    } catch (error) {
      throw new StoreError(
        `Failed to upsert ownership for token ${input.tokenId}: ${errorMessage(error)}`,
        { cause: error }
      );
    }
  }

  async findAll(options?: FindOwnershipOptions): Promise<OwnershipRecord[]> {
    LogPatterns.dbOperation(this.logger, 'findAll', TABLE, { order: options?.order ?? 'desc' });

    try {
      const rows = await this.db
        .select()
        .from(ownershipRecords)
        .orderBy(this.orderBy(options));
      return rows.map(toOwnershipRecord);
    } catch (error) {
      throw new StoreError(`Failed to list ownership records: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }

  async findByOwner(
    ownerAddress: Address,
    options?: FindOwnershipOptions
  ): Promise<OwnershipRecord[]> {
    LogPatterns.dbOperation(this.logger, 'findByOwner', TABLE, { ownerAddress });

    try {
      const rows = await this.db
        .select()
        .from(ownershipRecords)
        .where(eq(ownershipRecords.ownerAddress, ownerAddress))
        .orderBy(this.orderBy(options));
      return rows.map(toOwnershipRecord);
    } catch (error) {
      throw new StoreError(
        `Failed to list ownership records for ${ownerAddress}: ${errorMessage(error)}`,
        { cause: error }
      );
    }
  }

  private orderBy(options?: FindOwnershipOptions) {
    return options?.order === 'asc' ? asc(ownershipRecords.tokenId) : desc(ownershipRecords.tokenId);
  }
}

/**
 * Map a table row to the domain record
 */
export function toOwnershipRecord(row: OwnershipRecordRow): OwnershipRecord {
  return {
    tokenId: row.tokenId,
    ownerAddress: row.ownerAddress,
    contractAddress: row.contractAddress,
    lastTxHash: row.lastTxHash,
    observedAt: row.observedAt,
  };
}
