/**
 * ERC-721 Transfer event ABI.
 * Transfer(address indexed from, address indexed to, uint256 indexed tokenId)
 *
 * All three parameters are indexed, so a matching log carries exactly four topics
 * and an empty data payload.
 */
export const ERC721_TRANSFER_EVENT = {
  type: 'event',
  name: 'Transfer',
  inputs: [
    { type: 'address', name: 'from', indexed: true },
    { type: 'address', name: 'to', indexed: true },
    { type: 'uint256', name: 'tokenId', indexed: true },
  ],
} as const;

export type Erc721TransferEvent = typeof ERC721_TRANSFER_EVENT;

export const ERC721_TRANSFER_SIGNATURE = 'Transfer(address,address,uint256)';
