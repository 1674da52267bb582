/**
 * OwnershipService Tests
 *
 * Runs against an in-memory libsql database.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { createDb, ensureSchema, type Db } from '@nftrack/database';
import { StoreError } from '@nftrack/shared';
import { OwnershipService } from './ownership-service.js';
import {
  CONTRACT_A,
  CONTRACT_B,
  OWNER_X,
  OWNER_Y,
  txHash,
} from '../../transfer/test-fixtures.js';

const T1 = new Date('2026-01-01T00:00:00.000Z');
const T2 = new Date('2026-01-02T00:00:00.000Z');

describe('OwnershipService', () => {
  let db: Db;
  let service: OwnershipService;

  beforeEach(async () => {
    db = createDb({ url: ':memory:' });
    await ensureSchema(db);
    service = new OwnershipService({ db });
  });

  afterEach(() => {
    db.client.close();
  });

  describe('upsert', () => {
    it('should insert a new record', async () => {
      await service.upsert({
        tokenId: 7,
        ownerAddress: OWNER_X,
        contractAddress: CONTRACT_A,
        txHash: txHash(101),
        observedAt: T1,
      });

      expect(await service.findAll()).toEqual([
        {
          tokenId: 7,
          ownerAddress: OWNER_X,
          contractAddress: CONTRACT_A,
          lastTxHash: txHash(101),
          observedAt: T1,
        },
      ]);
    });

    it('should replace every non-key field on conflict', async () => {
      await service.upsert({
        tokenId: 7,
        ownerAddress: OWNER_X,
        contractAddress: CONTRACT_A,
        txHash: txHash(101),
        observedAt: T1,
      });
      await service.upsert({
        tokenId: 7,
        ownerAddress: OWNER_Y,
        contractAddress: CONTRACT_B,
        txHash: txHash(104),
        observedAt: T2,
      });

      expect(await service.findAll()).toEqual([
        {
          tokenId: 7,
          ownerAddress: OWNER_Y,
          contractAddress: CONTRACT_B,
          lastTxHash: txHash(104),
          observedAt: T2,
        },
      ]);
    });

    it('should be idempotent', async () => {
      const input = {
        tokenId: 9,
        ownerAddress: OWNER_X,
        contractAddress: CONTRACT_A,
        txHash: txHash(108),
        observedAt: T1,
      };

      await service.upsert(input);
      const once = await service.findAll();
      await service.upsert(input);
      await service.upsert(input);

      expect(await service.findAll()).toEqual(once);
    });

    it('should store the largest safe token id', async () => {
      await service.upsert({
        tokenId: Number.MAX_SAFE_INTEGER,
        ownerAddress: OWNER_X,
        contractAddress: CONTRACT_A,
        txHash: txHash(1),
        observedAt: T1,
      });

      const [record] = await service.findAll();
      expect(record.tokenId).toBe(Number.MAX_SAFE_INTEGER);
    });

    it('should wrap driver failures in StoreError', async () => {
      const closedDb = createDb({ url: ':memory:' });
      closedDb.client.close();
      const closedService = new OwnershipService({ db: closedDb });

      await expect(
        closedService.upsert({
          tokenId: 1,
          ownerAddress: OWNER_X,
          contractAddress: CONTRACT_A,
          txHash: txHash(1),
          observedAt: T1,
        })
      ).rejects.toBeInstanceOf(StoreError);
    });
  });

  describe('reads', () => {
    beforeEach(async () => {
      for (const [tokenId, owner] of [
        [3, OWNER_X],
        [11, OWNER_Y],
        [5, OWNER_X],
      ] as const) {
        await service.upsert({
          tokenId,
          ownerAddress: owner,
          contractAddress: CONTRACT_A,
          txHash: txHash(tokenId),
          observedAt: T1,
        });
      }
    });

    it('should list all records by descending token id', async () => {
      const records = await service.findAll();

      expect(records.map((r) => r.tokenId)).toEqual([11, 5, 3]);
    });

    it('should list ascending on request', async () => {
      const records = await service.findAll({ order: 'asc' });

      expect(records.map((r) => r.tokenId)).toEqual([3, 5, 11]);
    });

    it('should filter by owner', async () => {
      const records = await service.findByOwner(OWNER_X);

      expect(records.map((r) => r.tokenId)).toEqual([5, 3]);
      expect(records.every((r) => r.ownerAddress === OWNER_X)).toBe(true);
    });

    it('should return an empty list for an unknown owner', async () => {
      const records = await service.findByOwner('0x4444444444444444444444444444444444444444');

      expect(records).toEqual([]);
    });
  });
});
