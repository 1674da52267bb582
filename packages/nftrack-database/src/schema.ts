import { index, integer, sqliteTable, text } from 'drizzle-orm/sqlite-core';
import type { Address, Hash } from 'viem';

/**
 * Current owner per token. One row per token id.
 * Addresses are stored checksummed.
 */
export const ownershipRecords = sqliteTable(
  'ownership_records',
  {
    tokenId: integer('token_id', { mode: 'number' }).primaryKey(),
    ownerAddress: text('owner_address').$type<Address>().notNull(),
    contractAddress: text('contract_address').$type<Address>().notNull(),
    lastTxHash: text('last_tx_hash').$type<Hash>().notNull(),
    observedAt: integer('observed_at', { mode: 'timestamp_ms' }).notNull(),
  },
  (table) => ({
    ownerIdx: index('idx_ownership_records_owner').on(table.ownerAddress),
  })
);

export type OwnershipRecordRow = typeof ownershipRecords.$inferSelect;
export type NewOwnershipRecordRow = typeof ownershipRecords.$inferInsert;
