import { MalformedTransactionError } from '@sol-ledger/core';
import { err, ok, type Result } from 'neverthrow';

import type { SolanaRawTransaction, SolanaTokenAmount } from '../../types.js';

import type { HeliusTokenTransfer } from './helius.schemas.js';
import { HeliusEnhancedTransactionSchema } from './helius.schemas.js';

/**
 * Pure function for Helius transaction mapping
 * Following the Functional Core / Imperative Shell pattern
 */

function mapTokenAmount(transfer: HeliusTokenTransfer): SolanaTokenAmount {
  if (transfer.rawTokenAmount) {
    return {
      decimals: transfer.rawTokenAmount.decimals,
      kind: 'raw',
      rawAmount: String(transfer.rawTokenAmount.tokenAmount),
    };
  }
  return { amount: String(transfer.tokenAmount ?? 0), kind: 'scaled' };
}

/**
 * Signature of a page item, when it carries a usable one.
 * The cursor for the next page is taken from it.
 */
export function extractHeliusSignature(rawData: unknown): string | undefined {
  if (typeof rawData !== 'object' || rawData === null || !('signature' in rawData)) {
    return undefined;
  }
  const signature = rawData.signature;
  return typeof signature === 'string' && signature.length > 0 ? signature : undefined;
}

/**
 * Map a Helius enhanced transaction to a SolanaRawTransaction.
 * Items that do not carry the fields the ledger needs are reported as malformed.
 */
export function mapHeliusTransaction(rawData: unknown): Result<SolanaRawTransaction, MalformedTransactionError> {
  const parseResult = HeliusEnhancedTransactionSchema.safeParse(rawData);
  if (!parseResult.success) {
    const signature = extractHeliusSignature(rawData);
    const issues = parseResult.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    return err(
      new MalformedTransactionError(
        `Malformed transaction ${signature ?? '(no signature)'}: ${issues.slice(0, 3).join('; ')}`,
        signature,
        issues
      )
    );
  }

  const tx = parseResult.data;

  return ok({
    fee: tx.fee,
    nativeTransfers: tx.nativeTransfers.map((transfer) => ({
      amount: transfer.amount,
      fromAccount: transfer.fromUserAccount,
      toAccount: transfer.toUserAccount,
    })),
    signature: tx.signature,
    timestamp: tx.timestamp,
    tokenTransfers: tx.tokenTransfers.map((transfer) => ({
      amount: mapTokenAmount(transfer),
      fromAccount: transfer.fromUserAccount,
      mint: transfer.mint,
      toAccount: transfer.toUserAccount,
    })),
  });
}
