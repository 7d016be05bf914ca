// HTTP client with timeouts, 429 classification and policy-driven retries
export * from './client.js';

export * from './types.js';

// Pure functional core
export * from './core/http-utils.js';
export * from './core/types.js';
