import { getLogger, type Logger } from '@sol-ledger/logger';
import { executeWithRetry, type RetryPolicy } from '@sol-ledger/resilience';
import { err, ok, type Result } from 'neverthrow';
import { Agent, fetch as undiciFetch } from 'undici';

import * as HttpUtils from './core/http-utils.js';
import type { HttpEffects } from './core/types.js';
import type { HttpClientConfig, HttpRequestOptions } from './types.js';
import { HttpError, RateLimitError, ResponseValidationError } from './types.js';

export class HttpClient {
  private readonly config: HttpClientConfig;
  private readonly logger: Logger;
  private readonly effects: HttpEffects;
  private readonly agent: Agent;
  private readonly retryPolicy: RetryPolicy;

  // Close state (for idempotent cleanup)
  private closePromise?: Promise<void>;
  private isClosed = false;

  constructor(config: HttpClientConfig, effects?: Partial<HttpEffects>) {
    this.config = {
      timeout: 30000,
      ...config,
      defaultHeaders: {
        Accept: 'application/json',
        'User-Agent': 'sol-ledger-export/1.0.0',
        ...config.defaultHeaders,
      },
    };

    this.logger = getLogger(`HttpClient:${config.providerName}`);
    this.retryPolicy = config.retryPolicy;

    // Initialize undici agent for connection pooling and proper cleanup
    this.agent = new Agent({
      keepAliveTimeout: 10000, // 10 seconds
      keepAliveMaxTimeout: 60000, // 60 seconds
      pipelining: 1,
    });

    // Initialize effects with production defaults
    this.effects = {
      delay: (ms: number) => new Promise((resolve) => setTimeout(resolve, ms)),
      fetch: ((url: string | URL, init?: RequestInit) =>
        undiciFetch(url, { ...init, dispatcher: this.agent })) as typeof fetch,
      log: (level, message, metadata) => {
        if (metadata) {
          this.logger[level](metadata, message);
        } else {
          this.logger[level](message);
        }
      },
      ...effects,
    };

    this.logger.debug(
      `HTTP client initialized - BaseUrl: ${HttpUtils.sanitizeUrl(config.baseUrl)}, Timeout: ${this.config.timeout}ms, MaxAttempts: ${this.retryPolicy.maxAttempts}`
    );
  }

  /**
   * GET a JSON resource and validate it against `options.schema`.
   * Failed attempts are retried according to the client's retry policy.
   */
  async get<T>(endpoint: string, options: HttpRequestOptions<T>): Promise<Result<T, Error>> {
    const url = HttpUtils.buildUrl(this.config.baseUrl, endpoint, options.query);
    const sanitizedUrl = HttpUtils.sanitizeUrl(url);

    return executeWithRetry(this.retryPolicy, (attempt) => this.attemptRequest(url, endpoint, options, attempt), {
      delay: this.effects.delay,
      onRetry: ({ attempt, delayMs, error, maxAttempts }) => {
        const reason = error instanceof RateLimitError ? 'Rate limited' : `Request failed (${error.message})`;
        this.effects.log(
          'warn',
          `${reason} - retrying in ${delayMs / 1000}s - URL: ${sanitizedUrl}, Attempt: ${attempt + 1}/${maxAttempts}`,
          { providerName: this.config.providerName, status: error instanceof HttpError ? error.statusCode : undefined }
        );
      },
    });
  }

  /**
   * Cleanup resources.
   * Closes the undici agent to terminate all keep-alive connections.
   * This allows the process to exit naturally without requiring process.exit().
   *
   * Idempotent: safe to call multiple times. Subsequent calls return the same promise.
   */
  async close(): Promise<void> {
    if (this.closePromise) {
      return this.closePromise;
    }

    if (this.isClosed) {
      return;
    }

    this.closePromise = (async () => {
      this.logger.debug('Closing HTTP agent connections');
      try {
        await this.agent.close();
        this.isClosed = true;
        this.logger.debug('HTTP agent closed successfully');
      } catch (error) {
        const errorMessage = error instanceof Error ? error.message : String(error);
        this.logger.error(`Failed to close HTTP agent: ${errorMessage}`);
        throw new Error(`HTTP agent cleanup failed: ${errorMessage}`);
      }
    })();

    return this.closePromise;
  }

  /**
   * Tear down the agent without waiting for in-flight requests.
   * Used when the command is interrupted; pending requests fail immediately.
   */
  async destroy(): Promise<void> {
    if (this.isClosed) {
      return;
    }

    this.isClosed = true;
    this.logger.debug('Destroying HTTP agent connections');
    await this.agent.destroy();
  }

  /**
   * One physical request. Every failure is returned as a classified error
   * so the retry policy can decide what happens next.
   */
  private async attemptRequest<T>(
    url: string,
    endpoint: string,
    options: HttpRequestOptions<T>,
    attempt: number
  ): Promise<Result<T, Error>> {
    const timeout = options.timeout ?? this.config.timeout ?? 30000;
    const sanitizedUrl = HttpUtils.sanitizeUrl(url);
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeout);

    try {
      this.effects.log(
        'debug',
        `Making HTTP request - URL: ${sanitizedUrl}, Method: GET, Attempt: ${attempt + 1}/${this.retryPolicy.maxAttempts}`
      );

      const response = await this.effects.fetch(url, {
        headers: { ...this.config.defaultHeaders, ...options.headers },
        method: 'GET',
        signal: controller.signal,
      });

      if (!response.ok) {
        const errorText = await response.text().catch(() => 'Unknown error');

        if (response.status === 429) {
          return err(new RateLimitError(`${this.config.providerName} rate limit exceeded (HTTP 429)`));
        }

        return err(new HttpError(`HTTP ${response.status}: ${errorText}`, response.status, errorText));
      }

      const text = await response.text();
      const data: unknown = text.length > 0 ? JSON.parse(text) : undefined;

      return this.validateResponse(data, endpoint, options, response.status, sanitizedUrl);
    } catch (error) {
      let failure = error instanceof Error ? error : new Error(String(error));
      if (failure.name === 'AbortError') {
        failure = new Error(`Request timeout after ${timeout}ms`);
      }

      this.effects.log('debug', `Request attempt failed - URL: ${sanitizedUrl}, Error: ${failure.message}`, {
        method: 'GET',
        providerName: this.config.providerName,
      });

      return err(failure);
    } finally {
      clearTimeout(timeoutId);
    }
  }

  private validateResponse<T>(
    data: unknown,
    endpoint: string,
    options: HttpRequestOptions<T>,
    status: number,
    sanitizedUrl: string
  ): Result<T, Error> {
    const parseResult = options.schema.safeParse(data);
    if (parseResult.success) {
      return ok(parseResult.data);
    }

    const allIssues = parseResult.error.issues.map((issue) => ({
      message: issue.message,
      path: issue.path.join('.'),
    }));

    const firstFiveErrors = allIssues
      .slice(0, 5)
      .map((issue) => `${issue.path}: ${issue.message}`)
      .join('; ');

    const truncatedPayload = (JSON.stringify(data) ?? 'undefined').slice(0, 500);

    this.effects.log(
      'error',
      `Response validation failed (showing first 5 of ${allIssues.length} errors): ${firstFiveErrors}`,
      {
        method: 'GET',
        providerName: this.config.providerName,
        status,
        truncatedPayload,
        url: sanitizedUrl,
      }
    );

    return err(
      new ResponseValidationError(
        `Response validation failed: ${firstFiveErrors}`,
        this.config.providerName,
        endpoint,
        allIssues,
        truncatedPayload
      )
    );
  }
}
