/**
 * Test fixtures for transfer decoding and planning.
 * Digit-only addresses so their checksummed form equals the literal.
 */

import { numberToHex, pad, type Address, type Hash, type Hex } from 'viem';
import type { RawLog } from '@nftrack/shared';

export const TRANSFER_TOPIC0: Hex =
  '0xddf252ad1be2c89b69c2b068fc378daa952ba7f163c4a11628f55a4df523b3ef';

export const ZERO_ADDRESS: Address = '0x0000000000000000000000000000000000000000';
export const OWNER_X: Address = '0x1111111111111111111111111111111111111111';
export const OWNER_Y: Address = '0x2222222222222222222222222222222222222222';
export const OWNER_Z: Address = '0x3333333333333333333333333333333333333333';
export const CONTRACT_A: Address = '0x5555555555555555555555555555555555555555';
export const CONTRACT_B: Address = '0x6666666666666666666666666666666666666666';

export function addressTopic(address: Address): Hex {
  return pad(address, { size: 32 });
}

export function tokenIdTopic(tokenId: bigint): Hex {
  return numberToHex(tokenId, { size: 32 });
}

export function txHash(n: number): Hash {
  return numberToHex(n, { size: 32 });
}

export function createTransferLog(overrides: {
  tokenId: bigint;
  from?: Address;
  to: Address;
  blockNumber: bigint;
  logIndex?: number;
  address?: Address;
  transactionHash?: Hash;
}): RawLog {
  return {
    address: overrides.address ?? CONTRACT_A,
    topics: [
      TRANSFER_TOPIC0,
      addressTopic(overrides.from ?? ZERO_ADDRESS),
      addressTopic(overrides.to),
      tokenIdTopic(overrides.tokenId),
    ],
    data: '0x',
    blockNumber: overrides.blockNumber,
    logIndex: overrides.logIndex ?? 0,
    transactionHash: overrides.transactionHash ?? txHash(Number(overrides.blockNumber)),
  };
}
