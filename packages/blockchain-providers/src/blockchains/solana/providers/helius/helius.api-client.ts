import { FetchExhaustedError, getErrorMessage, InvalidAddressError } from '@sol-ledger/core';
import {
  HttpClient,
  RateLimitError,
  ResponseValidationError,
  type HttpEffects,
} from '@sol-ledger/http';
import { getLogger, type Logger } from '@sol-ledger/logger';
import {
  createRetryPolicy,
  exponentialDelay,
  RetryExhaustedError,
  type RetryPolicy,
} from '@sol-ledger/resilience';
import { err, ok, type Result } from 'neverthrow';

import { createCursorStreamingIterator, type CursorPageContext } from '../../../../core/streaming/streaming-adapter.js';
import type { SolanaRawTransaction } from '../../types.js';
import { isValidSolanaAddress } from '../../utils.js';

import { extractHeliusSignature, mapHeliusTransaction } from './helius.mapper-utils.js';
import { HeliusTransactionPageSchema } from './helius.schemas.js';

export const HELIUS_DEFAULT_BASE_URL = 'https://api.helius.xyz';

/** Pause between two successful page requests */
export const HELIUS_PAGE_DELAY_MS = 100;

export const HELIUS_MAX_ATTEMPTS = 5;

/**
 * Per-request retry policy for the enhanced-transactions API.
 * Attempt `n` (from 0) that was rate limited waits `min(2^n, 60)` seconds,
 * any other transport failure waits `2^n` seconds. Invalid payloads are final.
 */
export function createHeliusRetryPolicy(maxAttempts = HELIUS_MAX_ATTEMPTS): RetryPolicy {
  return createRetryPolicy({
    getDelayMs: (attempt, error) =>
      error instanceof RateLimitError ? exponentialDelay(attempt, 1000, 60_000) : exponentialDelay(attempt, 1000),
    isRetryable: (error) => !(error instanceof ResponseValidationError),
    maxAttempts,
  });
}

export interface HeliusFetcherConfig {
  apiKey: string;
  baseUrl?: string | undefined;
  pageDelayMs?: number | undefined;
  retryPolicy?: RetryPolicy | undefined;
  /** Per-request timeout in milliseconds */
  timeout?: number | undefined;
}

/**
 * Streams a wallet's history from the Helius enhanced-transactions API,
 * newest first, following the `before` signature cursor.
 */
export class HeliusTransactionFetcher {
  readonly name = 'helius';

  private readonly apiKey: string;
  private readonly delay: (ms: number) => Promise<void>;
  private readonly httpClient: HttpClient;
  private readonly logger: Logger;
  private readonly pageDelayMs: number;
  private readonly retryPolicy: RetryPolicy;

  constructor(config: HeliusFetcherConfig, effects?: Partial<HttpEffects>) {
    this.apiKey = config.apiKey;
    this.pageDelayMs = config.pageDelayMs ?? HELIUS_PAGE_DELAY_MS;
    this.retryPolicy = config.retryPolicy ?? createHeliusRetryPolicy();
    this.logger = getLogger('HeliusTransactionFetcher');
    this.delay = effects?.delay ?? ((ms: number) => new Promise((resolve) => setTimeout(resolve, ms)));

    this.httpClient = new HttpClient(
      {
        baseUrl: config.baseUrl ?? HELIUS_DEFAULT_BASE_URL,
        providerName: this.name,
        retryPolicy: this.retryPolicy,
        timeout: config.timeout ?? 30000,
      },
      effects
    );
  }

  /**
   * Lazily yield every transaction of `address`. Each call starts over from the newest transaction.
   *
   * A transaction that cannot be mapped is yielded as `MalformedTransactionError` and the
   * stream goes on. A page that cannot be fetched is yielded as `FetchExhaustedError` or
   * `ResponseValidationError` and ends the stream.
   */
  streamAddressTransactions(address: string): AsyncIterableIterator<Result<SolanaRawTransaction, Error>> {
    if (!isValidSolanaAddress(address)) {
      return (async function* invalidAddress() {
        yield err(new InvalidAddressError(address));
      })();
    }

    return createCursorStreamingIterator<unknown, SolanaRawTransaction>({
      delay: this.delay,
      extractCursor: extractHeliusSignature,
      fetchPage: (ctx) => this.fetchPage(address, ctx),
      logger: this.logger,
      mapItem: (raw) => {
        const mapped = mapHeliusTransaction(raw);
        if (mapped.isErr()) {
          this.logger.warn(
            { issues: mapped.error.issues, signature: mapped.error.signature },
            `Skipping malformed transaction ${mapped.error.signature ?? '(no signature)'}`
          );
        }
        return mapped;
      },
      pageDelayMs: this.pageDelayMs,
      providerName: this.name,
    });
  }

  async close(): Promise<void> {
    await this.httpClient.close();
  }

  /**
   * Drop open connections immediately, failing any request in flight.
   */
  async destroy(): Promise<void> {
    await this.httpClient.destroy();
  }

  private async fetchPage(address: string, ctx: CursorPageContext): Promise<Result<unknown[], Error>> {
    const endpoint = `/v0/addresses/${address}/transactions`;
    const result = await this.httpClient.get(endpoint, {
      query: { 'api-key': this.apiKey, before: ctx.cursor },
      schema: HeliusTransactionPageSchema,
    });

    if (result.isOk()) {
      const items = result.value;
      // The cursor chain needs at least one signature per non-empty page
      if (items.length > 0 && !items.some((item) => extractHeliusSignature(item) !== undefined)) {
        const message = 'No transaction on the page carries a signature';
        this.logger.error({ cursor: ctx.cursor, pageNumber: ctx.pageNumber }, message);
        return err(
          new ResponseValidationError(
            `Response validation failed: ${message}`,
            this.name,
            endpoint,
            [{ message, path: 'signature' }],
            JSON.stringify(items).slice(0, 500)
          )
        );
      }
      return ok(items);
    }

    const error = result.error;
    this.logger.error(
      { cursor: ctx.cursor, pageNumber: ctx.pageNumber },
      `Failed to fetch transactions page - Error: ${getErrorMessage(error)}`
    );

    if (error instanceof RetryExhaustedError) {
      return err(new FetchExhaustedError(error.attempts, error.lastError, ctx.cursor));
    }
    return err(error);
  }
}
