export * from './erc721-transfer.js';
