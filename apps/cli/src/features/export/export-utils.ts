// Pure utility functions for export command
// All functions are pure - no side effects

import { isValidSolanaAddress } from '@sol-ledger/blockchain-providers';
import type { LedgerCsvRecord, LedgerRow } from '@sol-ledger/core';
import { formatDecimal, InvalidAddressError, LEDGER_CSV_COLUMNS } from '@sol-ledger/core';
import type { Decimal } from 'decimal.js';
import { err, ok, type Result } from 'neverthrow';
import type { z } from 'zod';

import type { ExportCommandOptionsSchema } from '../shared/schemas.js';

/**
 * Export command options after validation by Zod at CLI boundary
 */
export type ExportCommandOptions = z.output<typeof ExportCommandOptionsSchema>;

/**
 * Export handler parameters.
 */
export interface ExportHandlerParams {
  /** Wallet whose history is exported */
  address: string;

  /** Output file path */
  outputPath: string;
}

/**
 * Build export parameters from validated CLI flags.
 */
export function buildExportParamsFromFlags(options: ExportCommandOptions): Result<ExportHandlerParams, Error> {
  if (!isValidSolanaAddress(options.address)) {
    return err(new InvalidAddressError(options.address));
  }

  return ok({
    address: options.address,
    outputPath: options.output,
  });
}

/**
 * Escape a value per RFC 4180: quote fields containing commas, quotes, or
 * line breaks and escape internal quotes by doubling them.
 */
export function escapeCsvValue(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replaceAll('"', '""')}"`;
  }
  return value;
}

export function formatCsvLine(values: readonly string[]): string {
  return values.map((value) => escapeCsvValue(value)).join(',');
}

function formatAmount(amount: Decimal | undefined): string {
  return amount ? formatDecimal(amount) : '';
}

/**
 * Map a ledger row onto the CSV columns; absent values become empty strings.
 */
export function ledgerRowToCsvRecord(row: LedgerRow): LedgerCsvRecord {
  return {
    Date: row.date,
    TxHash: row.txHash,
    TxSrc: row.counterpartySrc,
    TxDest: row.counterpartyDest,
    'Sent Amount': formatAmount(row.sentAmount),
    'Sent Currency': row.sentCurrency ?? '',
    'Received Amount': formatAmount(row.receivedAmount),
    'Received Currency': row.receivedCurrency ?? '',
    'Fee Amount': formatAmount(row.feeAmount),
    'Fee Currency': row.feeCurrency ?? '',
  };
}

export function formatLedgerCsvHeader(): string {
  return formatCsvLine(LEDGER_CSV_COLUMNS);
}

export function formatLedgerCsvRow(row: LedgerRow): string {
  const record = ledgerRowToCsvRecord(row);
  return formatCsvLine(LEDGER_CSV_COLUMNS.map((column) => record[column]));
}
