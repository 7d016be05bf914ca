import type { Decimal } from 'decimal.js';

/**
 * One normalized line of the exported ledger.
 *
 * A row exists only for transactions in which the wallet is a genuine
 * counterparty on at least one transfer leg. Absent amounts and currencies
 * are `undefined` and serialize as empty fields.
 */
export interface LedgerRow {
  /** UTC timestamp, `YYYY-MM-DD HH:mm:ss` */
  readonly date: string;
  readonly txHash: string;
  readonly counterpartySrc: string;
  readonly counterpartyDest: string;
  readonly sentAmount?: Decimal | undefined;
  readonly sentCurrency?: string | undefined;
  readonly receivedAmount?: Decimal | undefined;
  readonly receivedCurrency?: string | undefined;
  readonly feeAmount?: Decimal | undefined;
  readonly feeCurrency?: string | undefined;
}

/**
 * Column headers of the CSV ledger, in output order.
 */
export const LEDGER_CSV_COLUMNS = [
  'Date',
  'TxHash',
  'TxSrc',
  'TxDest',
  'Sent Amount',
  'Sent Currency',
  'Received Amount',
  'Received Currency',
  'Fee Amount',
  'Fee Currency',
] as const;

export type LedgerCsvColumn = (typeof LEDGER_CSV_COLUMNS)[number];

export type LedgerCsvRecord = Record<LedgerCsvColumn, string>;
