/**
 * In-process stand-ins for the tracker's collaborators.
 */

import type { Address } from 'viem';
import {
  StoreError,
  type EventSource,
  type FindOwnershipOptions,
  type LogFilterQuery,
  type OwnershipRecord,
  type OwnershipStore,
  type RawLog,
  type UpsertOwnershipInput,
} from '@nftrack/services';

/**
 * Serves logs from memory, filtered by the query like eth_getLogs would.
 * Queued failures are consumed one per call; a `null` entry means "succeed".
 */
export class InMemoryEventSource implements EventSource {
  head = 0n;
  logs: RawLog[] = [];
  headFailures: (Error | null)[] = [];
  fetchFailures: (Error | null)[] = [];
  /** Fails every head lookup while set */
  unavailable: Error | null = null;
  readonly fetchCalls: LogFilterQuery[] = [];
  onFetch: ((query: LogFilterQuery) => Promise<void>) | null = null;

  async currentHead(): Promise<bigint> {
    if (this.unavailable) {
      throw this.unavailable;
    }
    const failure = this.headFailures.shift();
    if (failure) {
      throw failure;
    }
    return this.head;
  }

  async fetchLogs(query: LogFilterQuery): Promise<RawLog[]> {
    this.fetchCalls.push(query);
    if (this.onFetch) {
      await this.onFetch(query);
    }
    const failure = this.fetchFailures.shift();
    if (failure) {
      throw failure;
    }

    return this.logs
      .filter(
        (log) =>
          log.blockNumber >= query.fromBlock &&
          log.blockNumber <= query.toBlock &&
          query.addresses.includes(log.address) &&
          log.topics[0] === query.topic0
      )
      .sort((a, b) =>
        a.blockNumber === b.blockNumber
          ? a.logIndex - b.logIndex
          : a.blockNumber < b.blockNumber
            ? -1
            : 1
      );
  }
}

export class InMemoryOwnershipStore implements OwnershipStore {
  readonly records = new Map<number, OwnershipRecord>();
  /** Token ids whose upsert fails with StoreError */
  readonly failingTokenIds = new Set<number>();

  async upsert(input: UpsertOwnershipInput): Promise<void> {
    if (this.failingTokenIds.has(input.tokenId)) {
      throw new StoreError(`Upsert failed for token ${input.tokenId}`);
    }
    this.records.set(input.tokenId, {
      tokenId: input.tokenId,
      ownerAddress: input.ownerAddress,
      contractAddress: input.contractAddress,
      lastTxHash: input.txHash,
      observedAt: input.observedAt,
    });
  }

  async findAll(options?: FindOwnershipOptions): Promise<OwnershipRecord[]> {
    return sortRecords([...this.records.values()], options);
  }

  async findByOwner(ownerAddress: Address, options?: FindOwnershipOptions): Promise<OwnershipRecord[]> {
    return sortRecords(
      [...this.records.values()].filter((record) => record.ownerAddress === ownerAddress),
      options
    );
  }
}

function sortRecords(records: OwnershipRecord[], options?: FindOwnershipOptions): OwnershipRecord[] {
  const direction = options?.order === 'asc' ? 1 : -1;
  return records.sort((a, b) => (a.tokenId - b.tokenId) * direction);
}

export function createGate(): { promise: Promise<void>; open: () => void } {
  let open: () => void = () => undefined;
  const promise = new Promise<void>((resolve) => {
    open = resolve;
  });
  return { promise, open };
}
