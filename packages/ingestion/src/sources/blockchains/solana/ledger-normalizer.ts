import type { SolanaRawTransaction } from '@sol-ledger/blockchain-providers';
import { SOL_SYMBOL } from '@sol-ledger/blockchain-providers';
import type { LedgerRow } from '@sol-ledger/core';
import { getLogger } from '@sol-ledger/logger';

import { aggregateSolanaLegs, calculateLedgerFee, classifySolanaTransfers, formatLedgerDate } from './ledger-utils.js';

const logger = getLogger('solana-ledger-normalizer');

/**
 * Turn one transaction into at most one ledger row for `wallet`.
 * Transactions in which no transfer moves value into or out of the wallet produce no row.
 */
export function normalizeTransaction(tx: SolanaRawTransaction, wallet: string): LedgerRow | undefined {
  const legs = classifySolanaTransfers(tx, wallet);

  const sent = aggregateSolanaLegs(legs.sent);
  const received = aggregateSolanaLegs(legs.received);

  if (!sent && !received) {
    logger.debug(`No transfers touching the wallet in ${tx.signature}, skipping`);
    return undefined;
  }

  const fee = calculateLedgerFee(tx.fee);

  return {
    // A mint or burn leg has no counterparty; fall back to the other side
    counterpartyDest: received?.counterparty || sent?.counterparty || '',
    counterpartySrc: sent?.counterparty || received?.counterparty || '',
    date: formatLedgerDate(tx.timestamp),
    feeAmount: fee,
    feeCurrency: fee ? SOL_SYMBOL : undefined,
    receivedAmount: received?.amount,
    receivedCurrency: received?.currency,
    sentAmount: sent?.amount,
    sentCurrency: sent?.currency,
    txHash: tx.signature,
  };
}
