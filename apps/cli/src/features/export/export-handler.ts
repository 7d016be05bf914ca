import type { SolanaRawTransaction } from '@sol-ledger/blockchain-providers';
import { DomainError, ExportCancelledError, toError } from '@sol-ledger/core';
import { normalizeTransaction } from '@sol-ledger/ingestion';
import { getLogger } from '@sol-ledger/logger';
import { err, ok, type Result } from 'neverthrow';

import { CsvLedgerSink } from './csv-sink.js';
import type { ExportHandlerParams } from './export-utils.js';

// Re-export for convenience
export type { ExportHandlerParams };

const logger = getLogger('ExportHandler');

/**
 * Anything that can stream a wallet's transactions, newest first
 */
export interface TransactionSource {
  streamAddressTransactions(address: string): AsyncIterableIterator<Result<SolanaRawTransaction, Error>>;
}

/**
 * Connection owner behind a transaction source
 */
export interface ReleasableSource {
  close(): Promise<void>;
  destroy(): Promise<void>;
}

/**
 * Close the source once the export is over. An interrupted export tears the
 * connections down instead of waiting for the request in flight.
 */
export function releaseTransactionSource(source: ReleasableSource, signal: AbortSignal): Promise<void> {
  return signal.aborted ? source.destroy() : source.close();
}

/**
 * Result of the export operation.
 */
export interface ExportResult {
  /** Output file path */
  outputPath: string;

  /** Rows written to the ledger */
  rowCount: number;

  /** Transactions skipped because they could not be read */
  skippedCount: number;

  /** Transactions received from the provider, skipped ones excluded */
  transactionCount: number;
}

/**
 * Export handler - pulls transactions from the source one at a time,
 * normalizes them and hands every row to the CSV sink immediately.
 */
export class ExportHandler {
  constructor(private readonly source: TransactionSource) {}

  /**
   * Execute the export operation.
   * On failure the rows written so far stay in the partial file.
   */
  async execute(params: ExportHandlerParams, signal?: AbortSignal): Promise<Result<ExportResult, Error>> {
    logger.info({ params }, 'Starting export');

    const sinkResult = await CsvLedgerSink.open(params.outputPath);
    if (sinkResult.isErr()) {
      return err(sinkResult.error);
    }
    const sink = sinkResult.value;

    let skippedCount = 0;
    let transactionCount = 0;

    try {
      for await (const result of this.source.streamAddressTransactions(params.address)) {
        if (signal?.aborted) {
          await sink.abort();
          return err(new ExportCancelledError(sink.partialPath));
        }

        if (result.isErr()) {
          if (result.error instanceof DomainError && !result.error.fatal) {
            skippedCount++;
            continue;
          }
          logger.error({ error: result.error }, `Export aborted after ${sink.rowCount} rows`);
          await sink.abort();
          return err(result.error);
        }

        transactionCount++;
        const row = normalizeTransaction(result.value, params.address);
        if (!row) {
          continue;
        }

        const writeResult = await sink.write(row);
        if (writeResult.isErr()) {
          await sink.abort();
          return err(writeResult.error);
        }

        if (sink.rowCount % 100 === 0) {
          logger.info(`Exported ${sink.rowCount} rows (${transactionCount} transactions)`);
        }
      }
    } catch (error) {
      await sink.abort();
      return err(toError(error));
    }

    const commitResult = await sink.commit();
    if (commitResult.isErr()) {
      return err(commitResult.error);
    }

    logger.info(
      { rowCount: sink.rowCount, skippedCount, transactionCount },
      `Export complete: ${sink.rowCount} rows written to ${commitResult.value}`
    );

    return ok({
      outputPath: commitResult.value,
      rowCount: sink.rowCount,
      skippedCount,
      transactionCount,
    });
  }
}
