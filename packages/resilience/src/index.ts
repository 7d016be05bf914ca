export * from './retry/types.js';
export * from './retry/retry-policy.js';
