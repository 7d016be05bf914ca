#!/usr/bin/env node
import './env-setup.js';

import { toError } from '@sol-ledger/core';
import { getLogger } from '@sol-ledger/logger';
import { Command, CommanderError } from 'commander';

import { registerExportCommand } from './features/export/export.js';
import { displayCliError } from './features/shared/cli-error.js';
import { ExitCodes, exitWithCode } from './features/shared/exit-codes.js';

const logger = getLogger('CLI');
const program = new Command();

async function main() {
  program
    .name('sol-ledger-export')
    .description("Export a Solana wallet's transaction history to a CSV ledger")
    .version('1.0.0')
    .exitOverride();

  registerExportCommand(program);

  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    if (error instanceof CommanderError) {
      // commander has already printed its message
      exitWithCode(error.exitCode === 0 ? ExitCodes.SUCCESS : ExitCodes.INVALID_ARGS);
    }
    throw error;
  }
}

main().catch((error: unknown) => {
  const failure = toError(error);
  logger.error({ error: failure }, 'Unhandled CLI error');
  displayCliError(failure, ExitCodes.GENERAL_ERROR);
});
