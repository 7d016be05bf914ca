import { parseDecimal, scaleByDecimals } from '@sol-ledger/core';
import type { Decimal } from 'decimal.js';

import type { SolanaTokenAmount } from './types.js';

/** Wrapped-SOL mint, used as the currency identifier of native transfers */
export const SOL_NATIVE_MINT = 'So11111111111111111111111111111111111111112';

export const SOL_DECIMALS = 9;

export const SOL_SYMBOL = 'SOL';

/**
 * Validate Solana address format
 */
export function isValidSolanaAddress(address: string): boolean {
  // Solana addresses are base58 encoded and typically 32-44 characters
  const base58Regex = /^[1-9A-HJ-NP-Za-km-z]{32,44}$/;
  return base58Regex.test(address);
}

/**
 * Convert lamports to SOL
 */
export function lamportsToSol(lamports: number | string): Decimal {
  return scaleByDecimals(lamports, SOL_DECIMALS);
}

/**
 * Decimal value of a token amount in whole token units
 */
export function tokenAmountToDecimal(amount: SolanaTokenAmount): Decimal {
  return amount.kind === 'raw' ? scaleByDecimals(amount.rawAmount, amount.decimals) : parseDecimal(amount.amount);
}
