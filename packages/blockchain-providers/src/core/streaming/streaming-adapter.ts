import type { Logger } from '@sol-ledger/logger';
import { err, type Result } from 'neverthrow';

/**
 * Context passed into fetchPage on every iteration.
 * - cursor: opaque cursor taken from the last item of the previous page that carries one;
 *   undefined on the first request
 * - pageNumber: zero-based index, for logging
 */
export interface CursorPageContext {
  cursor?: string | undefined;
  pageNumber: number;
}

/**
 * Configuration for the cursor streaming adapter. Supply only provider-specific
 * pieces; the adapter owns the loop, the cursor chain and the pause between pages.
 */
export interface CursorStreamingOptions<Raw, Tx> {
  providerName: string;
  /** Perform the HTTP call for one page; an empty page ends the stream */
  fetchPage: (ctx: CursorPageContext) => Promise<Result<Raw[], Error>>;
  /** Cursor for the page that follows the one ending with `raw`; undefined when `raw` carries none */
  extractCursor: (raw: Raw) => string | undefined;
  /**
   * Map one raw item. A failed item is yielded as an error and the stream
   * continues; a failed page is yielded as an error and ends the stream.
   */
  mapItem: (raw: Raw) => Result<Tx, Error>;
  /** Pause after each non-empty page, before the next request */
  pageDelayMs?: number | undefined;
  delay: (ms: number) => Promise<void>;
  logger?: Logger | undefined;
}

function findLastCursor<Raw>(rawItems: Raw[], extractCursor: (raw: Raw) => string | undefined): string | undefined {
  for (let i = rawItems.length - 1; i >= 0; i--) {
    const raw = rawItems[i];
    const cursor = raw === undefined ? undefined : extractCursor(raw);
    if (cursor !== undefined) {
      return cursor;
    }
  }
  return undefined;
}

/**
 * Walk a cursor-paginated history until the provider returns an empty page.
 * Items are yielded in the order received.
 */
export function createCursorStreamingIterator<Raw, Tx>(
  opts: CursorStreamingOptions<Raw, Tx>
): AsyncIterableIterator<Result<Tx, Error>> {
  const { providerName, fetchPage, extractCursor, mapItem, pageDelayMs = 0, delay, logger } = opts;

  return (async function* streamingGenerator() {
    let cursor: string | undefined;
    let pageNumber = 0;
    let totalFetched = 0;

    let pageResult = await fetchPage({ cursor, pageNumber });

    while (pageResult.isOk() && pageResult.value.length > 0) {
      const rawItems = pageResult.value;

      for (const raw of rawItems) {
        yield mapItem(raw);
      }

      totalFetched += rawItems.length;
      const nextCursor = findLastCursor(rawItems, extractCursor);
      if (nextCursor === undefined) {
        // Requesting the same cursor again would return this page forever
        yield err(new Error(`${providerName} page ${pageNumber + 1} has no item to continue from`));
        return;
      }
      cursor = nextCursor;

      logger?.debug(
        { cursor, pageNumber, pageSize: rawItems.length, providerName, totalFetched },
        `Fetched page ${pageNumber + 1} from ${providerName}`
      );

      pageNumber++;
      if (pageDelayMs > 0) {
        await delay(pageDelayMs);
      }

      pageResult = await fetchPage({ cursor, pageNumber });
    }

    if (pageResult.isErr()) {
      yield err(pageResult.error);
      return;
    }

    logger?.debug({ pageNumber, providerName, totalFetched }, `Reached end of history on ${providerName}`);
  })();
}
