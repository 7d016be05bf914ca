import type { RetryPolicy } from '@sol-ledger/resilience';
import type { ZodType, ZodTypeDef } from 'zod';

import type { QueryParams } from './core/types.js';

export interface HttpClientConfig {
  baseUrl: string;
  defaultHeaders?: Record<string, string> | undefined;
  providerName: string;
  /** Retry policy applied to every request */
  retryPolicy: RetryPolicy;
  /** Per-attempt timeout in milliseconds */
  timeout?: number | undefined;
}

export interface HttpRequestOptions<T> {
  headers?: Record<string, string> | undefined;
  query?: QueryParams | undefined;
  schema: ZodType<T, ZodTypeDef, unknown>;
  timeout?: number | undefined;
}

// HTTP-related error classes
export class HttpError extends Error {
  constructor(
    message: string,
    public statusCode: number,
    public responseBody: string
  ) {
    super(message);
    this.name = 'HttpError';
  }
}

/**
 * HTTP 429
 */
export class RateLimitError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RateLimitError';
  }
}

export class ResponseValidationError extends Error {
  constructor(
    message: string,
    public providerName: string,
    public endpoint: string,
    public validationIssues: { message: string; path: string }[],
    public truncatedPayload: string
  ) {
    super(message);
    this.name = 'ResponseValidationError';
  }
}
