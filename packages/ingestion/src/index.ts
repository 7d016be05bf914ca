export * from './sources/blockchains/solana/types.js';
export * from './sources/blockchains/solana/ledger-utils.js';
export { normalizeTransaction } from './sources/blockchains/solana/ledger-normalizer.js';
