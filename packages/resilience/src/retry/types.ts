import type { Result } from 'neverthrow';

/**
 * Retry policy for a single logical operation.
 *
 * Attempts are numbered from 0. `getDelayMs(attempt, error)` is the pause taken
 * after attempt `attempt` failed with `error`, before attempt `attempt + 1`.
 */
export interface RetryPolicy {
  /** Total number of attempts, including the first one */
  readonly maxAttempts: number;
  getDelayMs(attempt: number, error: Error): number;
  isRetryable(error: Error): boolean;
}

/** Reported before every pause between two attempts */
export interface RetryEvent {
  attempt: number;
  delayMs: number;
  error: Error;
  maxAttempts: number;
}

/**
 * Side effects of the retry loop, injectable for tests
 */
export interface RetryEffects {
  delay: (ms: number) => Promise<void>;
  onRetry?: ((event: RetryEvent) => void) | undefined;
}

export type RetryOperation<T> = (attempt: number) => Promise<Result<T, Error>>;
