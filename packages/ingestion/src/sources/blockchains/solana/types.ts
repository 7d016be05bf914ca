import type { Decimal } from 'decimal.js';

export type LegDirection = 'sent' | 'received';

/**
 * One transfer leg seen from the wallet: the amount moved, in which
 * currency (token mint), and the account on the other side.
 */
export interface SolanaLedgerLeg {
  amount: Decimal;
  counterparty: string;
  currency: string;
}

export interface SolanaClassifiedLegs {
  received: SolanaLedgerLeg[];
  sent: SolanaLedgerLeg[];
}

/**
 * Summary of one side (sent or received) of a transaction
 */
export interface SolanaAggregatedSide {
  /** Total of the primary currency at ledger precision; undefined when it sums to zero */
  amount: Decimal | undefined;
  counterparty: string;
  currency: string;
  /** Running total per currency, in order of first appearance */
  totals: Map<string, Decimal>;
}
