import { existsSync } from 'node:fs';

import { HeliusTransactionFetcher } from '@sol-ledger/blockchain-providers';
import type { Command } from 'commander';
import pc from 'picocolors';

import { printCliError, resolveExitCode } from '../shared/cli-error.js';
import { runCommand } from '../shared/command-runtime.js';
import { loadHeliusConfig } from '../shared/config.js';
import { ExitCodes } from '../shared/exit-codes.js';
import { DEFAULT_OUTPUT_PATH, ExportCommandOptionsSchema } from '../shared/schemas.js';

import { partialPathFor } from './csv-sink.js';
import type { ExportResult } from './export-handler.js';
import { ExportHandler, releaseTransactionSource } from './export-handler.js';
import { buildExportParamsFromFlags } from './export-utils.js';

/**
 * Register the export options and action on the root program.
 */
export function registerExportCommand(program: Command): void {
  program
    .option('-a, --address <address>', 'Solana wallet address to export')
    .option('-o, --output <file>', 'Output CSV file path', DEFAULT_OUTPUT_PATH)
    .action(async (rawOptions: unknown) => {
      await executeExportCommand(rawOptions);
    });
}

/**
 * Execute the export command.
 */
async function executeExportCommand(rawOptions: unknown): Promise<void> {
  await runCommand(async (ctx) => {
    // Validate options at CLI boundary with Zod
    const validationResult = ExportCommandOptionsSchema.safeParse(rawOptions);
    if (!validationResult.success) {
      const firstError = validationResult.error.issues[0];
      printCliError(new Error(firstError?.message ?? 'Invalid options'), ExitCodes.INVALID_ARGS);
      ctx.exitCode = ExitCodes.INVALID_ARGS;
      return;
    }

    const paramsResult = buildExportParamsFromFlags(validationResult.data);
    if (paramsResult.isErr()) {
      ctx.exitCode = resolveExitCode(paramsResult.error);
      printCliError(paramsResult.error, ctx.exitCode);
      return;
    }
    const params = paramsResult.value;

    // The credential is checked before any network activity
    const configResult = loadHeliusConfig(process.env);
    if (configResult.isErr()) {
      ctx.exitCode = resolveExitCode(configResult.error);
      printCliError(configResult.error, ctx.exitCode);
      return;
    }

    const fetcher = new HeliusTransactionFetcher(configResult.value);
    const controller = new AbortController();
    ctx.onCleanup(() => releaseTransactionSource(fetcher, controller.signal));

    ctx.onAbort(() => {
      controller.abort();
      process.stderr.write(
        `\n${pc.yellow('⚠')} Export interrupted, partial output left in ${partialPathFor(params.outputPath)}\n`
      );
    });

    const handler = new ExportHandler(fetcher);
    const result = await handler.execute(params, controller.signal);

    if (result.isErr()) {
      ctx.exitCode = resolveExitCode(result.error);
      printCliError(result.error, ctx.exitCode);
      const partialPath = partialPathFor(params.outputPath);
      if (existsSync(partialPath)) {
        process.stderr.write(`${pc.dim(`Partial output left in ${partialPath}`)}\n`);
      }
      return;
    }

    displayExportSuccess(result.value);
  });
}

function displayExportSuccess(exportResult: ExportResult): void {
  if (exportResult.rowCount === 0) {
    console.log(`\n${pc.yellow('⚠')} No transactions touching the wallet; wrote header only to ${exportResult.outputPath}`);
  } else {
    console.log(`\n${pc.green('✓')} Exported ${exportResult.rowCount} rows to: ${exportResult.outputPath}`);
  }

  if (exportResult.skippedCount > 0) {
    console.log(pc.dim(`${exportResult.skippedCount} malformed transactions were skipped (see log for details)`));
  }
}
