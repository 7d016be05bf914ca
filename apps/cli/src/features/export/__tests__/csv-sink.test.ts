import { existsSync } from 'node:fs';
import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';

import type { LedgerRow } from '@sol-ledger/core';
import { Decimal } from 'decimal.js';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { CsvLedgerSink, partialPathFor } from '../csv-sink.js';

const HEADER =
  'Date,TxHash,TxSrc,TxDest,Sent Amount,Sent Currency,Received Amount,Received Currency,Fee Amount,Fee Currency';

const row: LedgerRow = {
  counterpartyDest: 'Bob',
  counterpartySrc: 'Bob',
  date: '2023-11-14 22:13:20',
  feeAmount: new Decimal('0.000005'),
  feeCurrency: 'SOL',
  sentAmount: new Decimal('1.5'),
  sentCurrency: 'SOL-MINT',
  txHash: 'sig-1',
};

describe('CsvLedgerSink', () => {
  let dir: string;
  let outputPath: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'ledger-sink-'));
    outputPath = path.join(dir, 'transactions.csv');
  });

  afterEach(async () => {
    await rm(dir, { force: true, recursive: true });
  });

  it('derives the partial path from the output path', () => {
    expect(partialPathFor('out/ledger.csv')).toBe('out/ledger.csv.partial');
  });

  it('writes the header and rows, then moves the file into place on commit', async () => {
    const sink = (await CsvLedgerSink.open(outputPath))._unsafeUnwrap();

    expect(existsSync(`${outputPath}.partial`)).toBe(true);
    (await sink.write(row))._unsafeUnwrap();
    (await sink.write({ ...row, txHash: 'sig-2' }))._unsafeUnwrap();

    const committed = await sink.commit();

    expect(committed._unsafeUnwrap()).toBe(outputPath);
    expect(sink.rowCount).toBe(2);
    expect(existsSync(`${outputPath}.partial`)).toBe(false);
    expect(await readFile(outputPath, 'utf8')).toBe(
      [
        HEADER,
        '2023-11-14 22:13:20,sig-1,Bob,Bob,1.5,SOL-MINT,,,0.000005,SOL',
        '2023-11-14 22:13:20,sig-2,Bob,Bob,1.5,SOL-MINT,,,0.000005,SOL',
        '',
      ].join('\n')
    );
  });

  it('writes the header once even without rows', async () => {
    const sink = (await CsvLedgerSink.open(outputPath))._unsafeUnwrap();

    await sink.commit();

    expect(await readFile(outputPath, 'utf8')).toBe(`${HEADER}\n`);
  });

  it('leaves the partial file in place on abort', async () => {
    const sink = (await CsvLedgerSink.open(outputPath))._unsafeUnwrap();
    await sink.write(row);

    await sink.abort();

    expect(existsSync(outputPath)).toBe(false);
    expect(await readFile(`${outputPath}.partial`, 'utf8')).toBe(
      `${HEADER}\n2023-11-14 22:13:20,sig-1,Bob,Bob,1.5,SOL-MINT,,,0.000005,SOL\n`
    );
  });

  it('fails to open in a missing directory', async () => {
    const result = await CsvLedgerSink.open(path.join(dir, 'missing', 'transactions.csv'));

    expect(result._unsafeUnwrapErr().message).toContain('Failed to open output file');
  });
});
