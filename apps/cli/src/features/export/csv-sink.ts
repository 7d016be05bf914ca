import { open, rename, type FileHandle } from 'node:fs/promises';

import type { LedgerRow } from '@sol-ledger/core';
import { wrapError } from '@sol-ledger/core';
import { getLogger } from '@sol-ledger/logger';
import { ok, type Result } from 'neverthrow';

import { formatLedgerCsvHeader, formatLedgerCsvRow } from './export-utils.js';

const logger = getLogger('CsvLedgerSink');

/**
 * Where rows are written until the export completes
 */
export function partialPathFor(outputPath: string): string {
  return `${outputPath}.partial`;
}

/**
 * Streams ledger rows to `<output>.partial`, one whole line per write, and
 * moves the file to `<output>` on commit. After a failure or an interrupt the
 * partial file stays where it is.
 */
export class CsvLedgerSink {
  readonly partialPath: string;
  private closed = false;
  private _rowCount = 0;

  private constructor(
    readonly outputPath: string,
    private readonly handle: FileHandle
  ) {
    this.partialPath = partialPathFor(outputPath);
  }

  /**
   * Create the partial file and write the header line.
   */
  static async open(outputPath: string): Promise<Result<CsvLedgerSink, Error>> {
    const partialPath = partialPathFor(outputPath);
    let handle: FileHandle | undefined;
    try {
      handle = await open(partialPath, 'w');
      await handle.write(`${formatLedgerCsvHeader()}\n`);
      logger.debug(`Opened ${partialPath}`);
      return ok(new CsvLedgerSink(outputPath, handle));
    } catch (error) {
      await handle?.close();
      return wrapError(error, `Failed to open output file ${partialPath}`);
    }
  }

  get rowCount(): number {
    return this._rowCount;
  }

  async write(row: LedgerRow): Promise<Result<void, Error>> {
    try {
      await this.handle.write(`${formatLedgerCsvRow(row)}\n`);
      this._rowCount++;
      return ok(undefined);
    } catch (error) {
      return wrapError(error, `Failed to write to ${this.partialPath}`);
    }
  }

  /**
   * Close the file and move it to its final name.
   */
  async commit(): Promise<Result<string, Error>> {
    try {
      await this.close();
      await rename(this.partialPath, this.outputPath);
      logger.debug(`Moved ${this.partialPath} to ${this.outputPath}`);
      return ok(this.outputPath);
    } catch (error) {
      return wrapError(error, `Failed to finalize ${this.outputPath}`);
    }
  }

  /**
   * Close the file and leave it under its partial name.
   */
  async abort(): Promise<void> {
    await this.close();
    logger.warn(`Export incomplete, ${this._rowCount} rows left in ${this.partialPath}`);
  }

  private async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.handle.close();
  }
}
