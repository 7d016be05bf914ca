/**
 * Retry-with-backoff as a reusable policy object.
 *
 * Pure orchestrator: the operation, the pause and the reporting are supplied
 * by the caller, so the loop can be driven by fault injection in tests.
 */

import { err, type Result } from 'neverthrow';

import type { RetryEffects, RetryOperation, RetryPolicy } from './types.js';

/**
 * Every attempt of a retryable operation failed.
 */
export class RetryExhaustedError extends Error {
  constructor(
    public readonly attempts: number,
    public readonly lastError: Error
  ) {
    super(`Operation failed after ${attempts} attempts: ${lastError.message}`, { cause: lastError });
    this.name = 'RetryExhaustedError';
  }
}

/**
 * `baseDelayMs * 2^attempt`, capped at `maxDelayMs` (attempt numbered from 0).
 */
export function exponentialDelay(attempt: number, baseDelayMs: number, maxDelayMs = Number.POSITIVE_INFINITY): number {
  return Math.min(baseDelayMs * Math.pow(2, attempt), maxDelayMs);
}

export function createRetryPolicy(options: {
  getDelayMs: RetryPolicy['getDelayMs'];
  isRetryable?: RetryPolicy['isRetryable'] | undefined;
  maxAttempts: number;
}): RetryPolicy {
  if (!Number.isInteger(options.maxAttempts) || options.maxAttempts < 1) {
    throw new Error(`Invalid retry policy: maxAttempts must be a positive integer, got ${options.maxAttempts}`);
  }

  return {
    getDelayMs: options.getDelayMs,
    isRetryable: options.isRetryable ?? (() => true),
    maxAttempts: options.maxAttempts,
  };
}

/**
 * Run `operation` until it succeeds, fails with a non-retryable error, or
 * `policy.maxAttempts` attempts have failed. No pause follows the last attempt.
 *
 * A non-retryable error is returned as is; exhaustion is returned as
 * `RetryExhaustedError` carrying the last error.
 */
export async function executeWithRetry<T>(
  policy: RetryPolicy,
  operation: RetryOperation<T>,
  effects: RetryEffects
): Promise<Result<T, Error>> {
  let lastError: Error | undefined;

  for (let attempt = 0; attempt < policy.maxAttempts; attempt++) {
    const result = await operation(attempt);
    if (result.isOk()) {
      return result;
    }

    lastError = result.error;

    if (!policy.isRetryable(lastError)) {
      return err(lastError);
    }

    if (attempt < policy.maxAttempts - 1) {
      const delayMs = policy.getDelayMs(attempt, lastError);
      effects.onRetry?.({ attempt, delayMs, error: lastError, maxAttempts: policy.maxAttempts });
      await effects.delay(delayMs);
    }
  }

  return err(new RetryExhaustedError(policy.maxAttempts, lastError ?? new Error('Operation failed with unknown error')));
}
