export * from './errors/index.js';
export * from './types/ledger.js';
export * from './utils/decimal-utils.js';
export * from './utils/type-guard-utils.js';
