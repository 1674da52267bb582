import { describe, it, expect } from 'vitest';
import { getTableColumns } from 'drizzle-orm';
import { getTableConfig } from 'drizzle-orm/sqlite-core';
import { createDb, ensureSchema } from './client.js';
import { ownershipRecords } from './schema.js';

describe('ownershipRecords schema', () => {
  it('has expected columns', () => {
    const cols = getTableColumns(ownershipRecords);
    expect(Object.keys(cols).sort()).toEqual([
      'contractAddress',
      'lastTxHash',
      'observedAt',
      'ownerAddress',
      'tokenId',
    ]);
  });

  it('tokenId is primary key', () => {
    const cols = getTableColumns(ownershipRecords);
    expect(cols.tokenId.primary).toBe(true);
  });

  it('owner and contract columns are required', () => {
    const cols = getTableColumns(ownershipRecords);
    expect(cols.ownerAddress.notNull).toBe(true);
    expect(cols.contractAddress.notNull).toBe(true);
    expect(cols.lastTxHash.notNull).toBe(true);
  });

  it('declares the owner index', () => {
    const { indexes } = getTableConfig(ownershipRecords);
    expect(indexes.map((idx) => idx.config.name)).toEqual(['idx_ownership_records_owner']);
    expect(indexes[0]?.config.columns.map((col) => ('name' in col ? col.name : null))).toEqual(['owner_address']);
  });
});

describe('ensureSchema', () => {
  it('creates the table and can run twice', async () => {
    const db = createDb({ url: ':memory:' });

    await ensureSchema(db);
    await ensureSchema(db);

    const rows = await db.select().from(ownershipRecords);
    expect(rows).toEqual([]);

    db.client.close();
  });
});
