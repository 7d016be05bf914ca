/**
 * Error taxonomy for the ledger export.
 *
 * Retryable transport failures (rate limiting, network errors) live in
 * @sol-ledger/http and never leave the fetcher unless retries run out.
 */

/**
 * Base domain error. A non-fatal error costs one transaction; a fatal one ends the export.
 */
export abstract class DomainError extends Error {
  abstract readonly fatal: boolean;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.name = this.constructor.name;
  }
}

/**
 * A fetched transaction lacks fields needed for classification.
 * The transaction is skipped; the export continues.
 */
export class MalformedTransactionError extends DomainError {
  readonly fatal = false;

  constructor(
    message: string,
    public readonly signature: string | undefined,
    public readonly issues: string[] = []
  ) {
    super(message);
  }
}

/**
 * The API credential is absent. Raised before any network activity.
 */
export class CredentialMissingError extends DomainError {
  readonly fatal = true;

  constructor(public readonly variable: string) {
    super(`${variable} not found in environment or .env file`);
  }
}

/**
 * Every attempt to fetch one page failed. The cursor chain cannot be
 * continued past a missing page, so the whole export stops.
 */
export class FetchExhaustedError extends DomainError {
  readonly fatal = true;

  constructor(
    public readonly attempts: number,
    public readonly lastError: Error,
    public readonly cursor?: string | undefined
  ) {
    super(`Error fetching transactions after ${attempts} attempts: ${lastError.message}`, {
      cause: lastError,
    });
  }
}

/**
 * The wallet address is not a valid address for the chain.
 */
export class InvalidAddressError extends DomainError {
  readonly fatal = true;

  constructor(public readonly address: string) {
    super(`Invalid wallet address: ${address}`);
  }
}

/**
 * The user interrupted the export. Rows written so far stay in the partial file.
 */
export class ExportCancelledError extends DomainError {
  readonly fatal = true;

  constructor(public readonly partialPath: string) {
    super(`Export cancelled, partial output left in ${partialPath}`);
  }
}
