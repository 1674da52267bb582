/**
 * Read API
 *
 * GET /nft                  all ownership records, token id descending
 * GET /nft/:walletAddress   records owned by one wallet (400 on a malformed address)
 * GET /health               liveness plus tracker status
 */

import { Hono } from 'hono';
import { getAddress, isAddress } from 'viem';
import { errorMessage, type OwnershipStore, type ServiceLogger } from '@nftrack/services';
import { createLogger } from '../logger.js';
import type { TrackerStatus } from '../tracker/index.js';
import { serializeOwnershipRecord, serializeTrackerStatus } from './serializers.js';

export interface AppDeps {
  store: OwnershipStore;
  getTrackerStatus?: () => TrackerStatus;
  logger?: ServiceLogger;
}

export function createApp({ store, getTrackerStatus, logger }: AppDeps): Hono {
  const log = logger ?? createLogger('ReadApi');
  const app = new Hono();

  app.get('/health', (c) => {
    return c.json({
      status: 'ok',
      uptime: Math.floor(process.uptime()),
      tracker: getTrackerStatus ? serializeTrackerStatus(getTrackerStatus()) : null,
    });
  });

  app.get('/nft', async (c) => {
    const records = await store.findAll({ order: 'desc' });
    return c.json(records.map(serializeOwnershipRecord));
  });

  app.get('/nft/:walletAddress', async (c) => {
    const walletAddress = c.req.param('walletAddress');
    if (!isAddress(walletAddress, { strict: false })) {
      return c.json({ error: `Invalid wallet address: ${walletAddress}` }, 400);
    }

    const records = await store.findByOwner(getAddress(walletAddress), { order: 'desc' });
    return c.json(records.map(serializeOwnershipRecord));
  });

  app.onError((error, c) => {
    log.error({ path: c.req.path, error: errorMessage(error), msg: 'Request failed' });
    return c.json({ error: 'Failed to fetch NFTs' }, 500);
  });

  return app;
}
