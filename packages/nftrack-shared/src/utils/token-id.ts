import { TokenIdRangeError } from '../errors/index.js';

/**
 * Largest token id the ownership store can hold.
 *
 * The key column is read back as a JS number, so ids above 2^53 - 1 would lose
 * precision on the way out. Anything beyond is rejected, never truncated.
 */
export const MAX_STORE_TOKEN_ID = BigInt(Number.MAX_SAFE_INTEGER);

/**
 * Check whether a token id fits the store key.
 */
export function isStorableTokenId(tokenId: bigint): boolean {
  return tokenId >= 0n && tokenId <= MAX_STORE_TOKEN_ID;
}

/**
 * Convert an on-chain uint256 token id to the store key.
 *
 * @throws TokenIdRangeError if the id is negative or above MAX_STORE_TOKEN_ID
 */
export function toStoreTokenId(tokenId: bigint): number {
  if (!isStorableTokenId(tokenId)) {
    throw new TokenIdRangeError(tokenId, MAX_STORE_TOKEN_ID);
  }
  return Number(tokenId);
}
