/**
 * @nftrack/shared
 *
 * Shared types and utilities for nftrack.
 * Used by the database, services and worker packages.
 */

// Export all types
export * from './types/index.js';

// Export error taxonomy
export * from './errors/index.js';

// Export all utilities
export * from './utils/index.js';

// Export contract ABIs
export * from './abis/index.js';
