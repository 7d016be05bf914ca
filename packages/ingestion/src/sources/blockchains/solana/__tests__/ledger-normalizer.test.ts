import type { SolanaRawTransaction } from '@sol-ledger/blockchain-providers';
import { SOL_NATIVE_MINT } from '@sol-ledger/blockchain-providers';
import type { LedgerRow } from '@sol-ledger/core';
import { describe, expect, it } from 'vitest';

import { normalizeTransaction } from '../ledger-normalizer.js';

const WALLET = 'Wa11et1111111111111111111111111111111111111';
const ALICE = 'A1ice111111111111111111111111111111111111111';
const BOB = 'Bob11111111111111111111111111111111111111111';
const POOL = 'Poo11111111111111111111111111111111111111111';
const USDC_MINT = 'Usdc1111111111111111111111111111111111111111';

function createTransaction(overrides: Partial<SolanaRawTransaction> = {}): SolanaRawTransaction {
  return {
    fee: 5000,
    nativeTransfers: [],
    signature: 'sig-1',
    timestamp: 1_700_000_000,
    tokenTransfers: [],
    ...overrides,
  };
}

function toPlainRow(row: LedgerRow | undefined) {
  if (!row) return undefined;
  return {
    ...row,
    feeAmount: row.feeAmount?.toFixed(),
    receivedAmount: row.receivedAmount?.toFixed(),
    sentAmount: row.sentAmount?.toFixed(),
  };
}

describe('normalizeTransaction', () => {
  it('emits a sent row for a native transfer out of the wallet', () => {
    const tx = createTransaction({
      nativeTransfers: [{ amount: 1_500_000_000, fromAccount: WALLET, toAccount: BOB }],
    });

    expect(toPlainRow(normalizeTransaction(tx, WALLET))).toEqual({
      counterpartyDest: BOB,
      counterpartySrc: BOB,
      date: '2023-11-14 22:13:20',
      feeAmount: '0.000005',
      feeCurrency: 'SOL',
      receivedAmount: undefined,
      receivedCurrency: undefined,
      sentAmount: '1.5',
      sentCurrency: SOL_NATIVE_MINT,
      txHash: 'sig-1',
    });
  });

  it('emits no row when no transfer touches the wallet', () => {
    const tx = createTransaction({
      nativeTransfers: [{ amount: 1000, fromAccount: ALICE, toAccount: BOB }],
      tokenTransfers: [
        { amount: { amount: '3', kind: 'scaled' }, fromAccount: BOB, mint: USDC_MINT, toAccount: ALICE },
      ],
    });

    expect(normalizeTransaction(tx, WALLET)).toBeUndefined();
  });

  it('emits no row for a transaction without transfers', () => {
    expect(normalizeTransaction(createTransaction(), WALLET)).toBeUndefined();
  });

  it('fills an empty counterparty from the other side', () => {
    const tx = createTransaction({
      nativeTransfers: [{ amount: 1_000_000_000, fromAccount: WALLET, toAccount: BOB }],
      tokenTransfers: [{ amount: { amount: '5', kind: 'scaled' }, fromAccount: '', mint: USDC_MINT, toAccount: WALLET }],
    });

    const row = normalizeTransaction(tx, WALLET);

    expect(row?.counterpartySrc).toBe(BOB);
    expect(row?.counterpartyDest).toBe(BOB);
    expect(row?.receivedAmount?.toFixed()).toBe('5');
    expect(row?.sentAmount?.toFixed()).toBe('1');
  });

  it('leaves both counterparties empty for a mint into the wallet', () => {
    const tx = createTransaction({
      tokenTransfers: [{ amount: { amount: '5', kind: 'scaled' }, fromAccount: '', mint: USDC_MINT, toAccount: WALLET }],
    });

    const row = normalizeTransaction(tx, WALLET);

    expect(row?.counterpartySrc).toBe('');
    expect(row?.counterpartyDest).toBe('');
    expect(row?.receivedCurrency).toBe(USDC_MINT);
  });

  it('excludes self-transfers', () => {
    const tx = createTransaction({
      nativeTransfers: [{ amount: 2_000_000_000, fromAccount: WALLET, toAccount: WALLET }],
      tokenTransfers: [
        { amount: { amount: '10', kind: 'scaled' }, fromAccount: WALLET, mint: USDC_MINT, toAccount: WALLET },
      ],
    });

    expect(normalizeTransaction(tx, WALLET)).toBeUndefined();
  });

  it('sums same-mint legs and keeps the first counterparty', () => {
    const tx = createTransaction({
      tokenTransfers: [
        { amount: { decimals: 6, kind: 'raw', rawAmount: '1000000' }, fromAccount: WALLET, mint: USDC_MINT, toAccount: ALICE },
        { amount: { decimals: 6, kind: 'raw', rawAmount: '2500000' }, fromAccount: WALLET, mint: USDC_MINT, toAccount: BOB },
      ],
    });

    const row = normalizeTransaction(tx, WALLET);

    expect(row?.sentAmount?.toFixed()).toBe('3.5');
    expect(row?.sentCurrency).toBe(USDC_MINT);
    expect(row?.counterpartySrc).toBe(ALICE);
    expect(row?.counterpartyDest).toBe(ALICE);
  });

  it('emits a received row without fee when the fee is zero', () => {
    const tx = createTransaction({
      fee: 0,
      nativeTransfers: [{ amount: 2_000_000_000, fromAccount: ALICE, toAccount: WALLET }],
    });

    expect(toPlainRow(normalizeTransaction(tx, WALLET))).toEqual({
      counterpartyDest: ALICE,
      counterpartySrc: ALICE,
      date: '2023-11-14 22:13:20',
      feeAmount: undefined,
      feeCurrency: undefined,
      receivedAmount: '2',
      receivedCurrency: SOL_NATIVE_MINT,
      sentAmount: undefined,
      sentCurrency: undefined,
      txHash: 'sig-1',
    });
  });

  it('reports both sides of a swap', () => {
    const tx = createTransaction({
      nativeTransfers: [{ amount: 500_000_000, fromAccount: POOL, toAccount: WALLET }],
      tokenTransfers: [
        { amount: { decimals: 6, kind: 'raw', rawAmount: '75000000' }, fromAccount: WALLET, mint: USDC_MINT, toAccount: BOB },
      ],
    });

    const row = toPlainRow(normalizeTransaction(tx, WALLET));

    expect(row).toMatchObject({
      counterpartyDest: POOL,
      counterpartySrc: BOB,
      receivedAmount: '0.5',
      receivedCurrency: SOL_NATIVE_MINT,
      sentAmount: '75',
      sentCurrency: USDC_MINT,
    });
  });

  it('takes the primary currency from token transfers before native ones', () => {
    const tx = createTransaction({
      nativeTransfers: [{ amount: 1_000_000_000, fromAccount: WALLET, toAccount: ALICE }],
      tokenTransfers: [
        { amount: { amount: '5', kind: 'scaled' }, fromAccount: WALLET, mint: USDC_MINT, toAccount: BOB },
      ],
    });

    const row = normalizeTransaction(tx, WALLET);

    expect(row?.sentCurrency).toBe(USDC_MINT);
    expect(row?.sentAmount?.toFixed()).toBe('5');
    expect(row?.counterpartySrc).toBe(BOB);
  });

  it('rounds amounts half-up to nine decimals', () => {
    const tx = createTransaction({
      tokenTransfers: [
        { amount: { decimals: 10, kind: 'raw', rawAmount: '15' }, fromAccount: ALICE, mint: USDC_MINT, toAccount: WALLET },
      ],
    });

    expect(normalizeTransaction(tx, WALLET)?.receivedAmount?.toFixed()).toBe('0.000000002');
  });

  it('leaves the amount empty when the primary currency totals zero', () => {
    const tx = createTransaction({
      tokenTransfers: [
        { amount: { amount: '0', kind: 'scaled' }, fromAccount: ALICE, mint: USDC_MINT, toAccount: WALLET },
      ],
    });

    const row = normalizeTransaction(tx, WALLET);

    expect(row?.receivedAmount).toBeUndefined();
    expect(row?.receivedCurrency).toBe(USDC_MINT);
    expect(row?.counterpartySrc).toBe(ALICE);
  });

  it('returns deep-equal rows for equal input', () => {
    const tx = createTransaction({
      nativeTransfers: [{ amount: 42, fromAccount: ALICE, toAccount: WALLET }],
      tokenTransfers: [
        { amount: { amount: '1.25', kind: 'scaled' }, fromAccount: WALLET, mint: USDC_MINT, toAccount: BOB },
      ],
    });

    expect(normalizeTransaction(tx, WALLET)).toEqual(normalizeTransaction(structuredClone(tx), WALLET));
  });
});
