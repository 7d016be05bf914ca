export * from './core/streaming/streaming-adapter.js';

export * from './blockchains/solana/types.js';
export * from './blockchains/solana/utils.js';
export * from './blockchains/solana/providers/helius/helius.schemas.js';
export * from './blockchains/solana/providers/helius/helius.mapper-utils.js';
export * from './blockchains/solana/providers/helius/helius.api-client.js';
