/**
 * nftrack Services
 *
 * Building blocks of the transfer-tracking pipeline:
 * - TransferLogDecoder: raw log -> TransferFact
 * - FilterQueryPlanner: contract set + selector + block range -> LogFilterQuery
 * - ViemEventSource: chain head and eth_getLogs over viem
 * - OwnershipService: keyed ownership upserts and reads over drizzle
 */

// Re-export shared types from @nftrack/shared
export * from '@nftrack/shared';

// Export logging utilities
export * from './logging/index.js';

// Export utilities
export * from './utils/index.js';

// Export clients
export * from './clients/index.js';

// Export transfer pipeline pieces
export * from './transfer/index.js';

// Export services
export * from './services/ownership/index.js';

export const version = '0.1.0';
