/**
 * Chain-level transaction shapes consumed by the ledger normalizer.
 * Immutable once fetched.
 */

export interface SolanaNativeTransfer {
  readonly fromAccount: string;
  readonly toAccount: string;
  /** Lamports */
  readonly amount: number;
}

/**
 * Token amount as delivered by the API: either an integer in the token's
 * smallest unit plus its decimals, or an already scaled decimal.
 */
export type SolanaTokenAmount =
  | { readonly kind: 'raw'; readonly rawAmount: string; readonly decimals: number }
  | { readonly kind: 'scaled'; readonly amount: string };

export interface SolanaTokenTransfer {
  readonly fromAccount: string;
  readonly toAccount: string;
  readonly mint: string;
  readonly amount: SolanaTokenAmount;
}

export interface SolanaRawTransaction {
  readonly signature: string;
  /** Unix seconds */
  readonly timestamp: number;
  /** Lamports */
  readonly fee: number;
  readonly nativeTransfers: readonly SolanaNativeTransfer[];
  readonly tokenTransfers: readonly SolanaTokenTransfer[];
}
