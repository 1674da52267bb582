import type { Address, Hash } from 'viem';
import type { OwnershipRecord } from '@nftrack/services';
import type { TrackerStatus } from '../tracker/index.js';

export interface OwnershipRecordJson {
  tokenId: number;
  ownerAddress: Address;
  contractAddress: Address;
  lastTxHash: Hash;
  observedAt: string;
}

export function serializeOwnershipRecord(record: OwnershipRecord): OwnershipRecordJson {
  return {
    tokenId: record.tokenId,
    ownerAddress: record.ownerAddress,
    contractAddress: record.contractAddress,
    lastTxHash: record.lastTxHash,
    observedAt: record.observedAt.toISOString(),
  };
}

export interface TrackerStatusJson extends Omit<TrackerStatus, 'cursor'> {
  cursor: string | null;
}

/** bigint cursor as a decimal string */
export function serializeTrackerStatus(status: TrackerStatus): TrackerStatusJson {
  return { ...status, cursor: status.cursor?.toString() ?? null };
}
