import type { SolanaRawTransaction } from '@sol-ledger/blockchain-providers';
import {
  lamportsToSol,
  SOL_DECIMALS,
  SOL_NATIVE_MINT,
  tokenAmountToDecimal,
} from '@sol-ledger/blockchain-providers';
import { roundLedgerAmount } from '@sol-ledger/core';
import type { Decimal } from 'decimal.js';

import type { LegDirection, SolanaAggregatedSide, SolanaClassifiedLegs, SolanaLedgerLeg } from './types.js';

/**
 * Direction of a transfer relative to the wallet. Transfers the wallet is on
 * both sides of, or on neither side of, do not count.
 */
export function classifyTransferDirection(
  fromAccount: string,
  toAccount: string,
  wallet: string
): LegDirection | undefined {
  if (fromAccount === wallet && toAccount !== wallet) return 'sent';
  if (toAccount === wallet && fromAccount !== wallet) return 'received';
  return undefined;
}

/**
 * Split the transfers of a transaction into legs sent from and received by the wallet.
 * Token transfers come first; native transfers follow as transfers of the native
 * pseudo-mint with nine decimals. Order within each list is preserved.
 */
export function classifySolanaTransfers(tx: SolanaRawTransaction, wallet: string): SolanaClassifiedLegs {
  const legs: SolanaClassifiedLegs = { received: [], sent: [] };

  const transfers = [
    ...tx.tokenTransfers.map((transfer) => ({
      amount: tokenAmountToDecimal(transfer.amount),
      currency: transfer.mint,
      fromAccount: transfer.fromAccount,
      toAccount: transfer.toAccount,
    })),
    ...tx.nativeTransfers.map((transfer) => ({
      amount: tokenAmountToDecimal({ decimals: SOL_DECIMALS, kind: 'raw', rawAmount: String(transfer.amount) }),
      currency: SOL_NATIVE_MINT,
      fromAccount: transfer.fromAccount,
      toAccount: transfer.toAccount,
    })),
  ];

  for (const transfer of transfers) {
    const direction = classifyTransferDirection(transfer.fromAccount, transfer.toAccount, wallet);
    if (direction === 'sent') {
      legs.sent.push({ amount: transfer.amount, counterparty: transfer.toAccount, currency: transfer.currency });
    } else if (direction === 'received') {
      legs.received.push({ amount: transfer.amount, counterparty: transfer.fromAccount, currency: transfer.currency });
    }
  }

  return legs;
}

/**
 * Collapse the legs of one side into a single ledger entry.
 *
 * The counterparty is the one of the first leg and the primary currency is the
 * first currency seen; other currencies are totalled but not reported.
 * Returns undefined for an empty side.
 */
export function aggregateSolanaLegs(legs: readonly SolanaLedgerLeg[]): SolanaAggregatedSide | undefined {
  const [first] = legs;
  if (!first) {
    return undefined;
  }

  const totals = new Map<string, Decimal>();
  for (const leg of legs) {
    const existing = totals.get(leg.currency);
    totals.set(leg.currency, existing ? existing.plus(leg.amount) : leg.amount);
  }

  const primaryTotal = totals.get(first.currency) ?? first.amount;
  const amount = roundLedgerAmount(primaryTotal);

  return {
    amount: amount.isZero() ? undefined : amount,
    counterparty: first.counterparty,
    currency: first.currency,
    totals,
  };
}

/**
 * Transaction fee in SOL at ledger precision; undefined when the fee is zero.
 */
export function calculateLedgerFee(feeLamports: number): Decimal | undefined {
  const fee = roundLedgerAmount(lamportsToSol(feeLamports));
  return fee.isZero() ? undefined : fee;
}

/**
 * Unix seconds to a UTC `YYYY-MM-DD HH:mm:ss` string
 */
export function formatLedgerDate(timestamp: number): string {
  return new Date(timestamp * 1000).toISOString().slice(0, 19).replace('T', ' ');
}
