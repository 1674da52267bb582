/**
 * Database Package Entry Point
 *
 * Re-exports the drizzle schema and the client factory.
 */

export { createDb, ensureSchema, closeDb, type Db, type DatabaseConfig } from './client.js';
export * from './schema.js';
