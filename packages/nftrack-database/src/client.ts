/**
 * Database Client
 *
 * Creates a drizzle handle over a libsql client. The handle is constructed once
 * by the process entry point and passed to every collaborator that needs it.
 */

import { createClient, type Client } from '@libsql/client';
import { sql } from 'drizzle-orm';
import { drizzle, type LibSQLDatabase } from 'drizzle-orm/libsql';
import * as schema from './schema.js';

export type Db = LibSQLDatabase<typeof schema> & { client: Client };

export interface DatabaseConfig {
  /** libsql URL: `file:path.db`, `:memory:` or a remote `libsql://` URL */
  url: string;
  authToken?: string;
}

export function createDb(config: DatabaseConfig): Db {
  const client = createClient({
    url: config.url,
    authToken: config.authToken,
  });

  const db = drizzle(client, { schema });

  return Object.assign(db, { client });
}

/**
 * Create the ownership table and its index if they do not exist yet.
 */
export async function ensureSchema(db: Db): Promise<void> {
  await db.run(sql`CREATE TABLE IF NOT EXISTS ownership_records (
    token_id INTEGER PRIMARY KEY,
    owner_address TEXT NOT NULL,
    contract_address TEXT NOT NULL,
    last_tx_hash TEXT NOT NULL,
    observed_at INTEGER NOT NULL
  )`);
  await db.run(
    sql`CREATE INDEX IF NOT EXISTS idx_ownership_records_owner ON ownership_records(owner_address)`
  );
}

export function closeDb(db: Db): void {
  db.client.close();
}
