/**
 * nftrack Worker
 *
 * Long-running process that:
 * - Backfills ERC-721 Transfer logs of the configured contracts from FROM_BLOCK
 * - Polls for new logs every FETCH_INTERVAL and keeps the ownership table current
 * - Serves the ownership table over HTTP
 */

import 'dotenv/config';
import { serve, type ServerType } from '@hono/node-server';
import { closeDb, createDb, ensureSchema, type Db } from '@nftrack/database';
import {
  OwnershipService,
  ViemEventSource,
  createEvmPublicClient,
  errorMessage,
} from '@nftrack/services';
import { createApp } from './api/app.js';
import { loadConfig } from './config.js';
import { createLogger, trackerLog, workerLogger } from './logger.js';
import { TransferTracker } from './tracker/index.js';

const mainLogger = createLogger('main');

/**
 * Close the HTTP server and the database client
 */
async function shutdown(server: ServerType, db: Db): Promise<void> {
  await new Promise<void>((resolve) => {
    server.close(() => resolve());
  });
  closeDb(db);
  mainLogger.info('Shutdown complete');
}

/**
 * Main entry point
 */
async function main(): Promise<void> {
  mainLogger.info('Starting nftrack worker...');

  const config = loadConfig();

  mainLogger.info(
    {
      contracts: config.contractAddresses,
      startBlock: config.startBlock.toString(),
      pollIntervalMs: config.pollIntervalMs,
      backfillBatchSizeBlocks: config.backfillBatchSizeBlocks,
      logLevel: config.logLevel,
    },
    'Configuration loaded'
  );

  const db = createDb(config.database);
  await ensureSchema(db);

  const store = new OwnershipService({ db });
  const source = new ViemEventSource(createEvmPublicClient(config.rpcUrl));

  const tracker = new TransferTracker({
    source,
    store,
    contractAddresses: config.contractAddresses,
    startBlock: config.startBlock,
    pollIntervalMs: config.pollIntervalMs,
    batchSizeBlocks: config.backfillBatchSizeBlocks,
    maxConsecutiveSourceFailures: config.maxConsecutiveSourceFailures,
  });

  const app = createApp({ store, getTrackerStatus: () => tracker.getStatus() });
  const server = serve(
    { fetch: app.fetch, hostname: config.api.host, port: config.api.port },
    (info) => {
      mainLogger.info({ host: config.api.host, port: info.port }, 'Read API listening');
    }
  );

  const controller = new AbortController();
  const onSignal = (signal: NodeJS.Signals): void => {
    mainLogger.info({ signal }, 'Shutdown signal received, gracefully shutting down...');
    controller.abort();
  };
  process.once('SIGTERM', onSignal);
  process.once('SIGINT', onSignal);

  try {
    await tracker.run(controller.signal);
  } catch (error) {
    trackerLog.lifecycle(mainLogger, 'error', { error: errorMessage(error) });
    await shutdown(server, db);
    process.exit(1);
  }

  await shutdown(server, db);
  process.exit(0);
}

// Run
main().catch((error: unknown) => {
  workerLogger.error({ error: errorMessage(error) }, 'Worker failed to start');
  process.exit(1);
});
