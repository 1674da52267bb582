export type { OwnershipStore } from './ownership-store.js';
export { OwnershipService, toOwnershipRecord } from './ownership-service.js';
export { applyTransferFact, toUpsertOwnershipInput } from './ownership-upsert.js';
