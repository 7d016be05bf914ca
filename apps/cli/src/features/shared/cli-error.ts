import {
  CredentialMissingError,
  ExportCancelledError,
  FetchExhaustedError,
  InvalidAddressError,
} from '@sol-ledger/core';
import { RateLimitError, ResponseValidationError } from '@sol-ledger/http';
import pc from 'picocolors';

import { ExitCodes, type ExitCode } from './exit-codes.js';

/**
 * Tips shown after error messages, keyed by exit code.
 */
const ERROR_TIPS: Partial<Record<ExitCode, string>> = {
  [ExitCodes.INVALID_ARGS]: 'Check your command arguments and try again. Run with --help for usage information.',
  [ExitCodes.AUTHENTICATION_ERROR]: 'Set HELIUS_API_KEY in your environment or in a .env file in the current directory.',
  [ExitCodes.RATE_LIMIT]: 'You have exceeded the API rate limit. Wait a few minutes and try again.',
  [ExitCodes.NETWORK_ERROR]: 'Check your network connection and HELIUS_BASE_URL, then try again.',
};

/**
 * Exit code for an error that ended an export.
 */
export function resolveExitCode(error: Error): ExitCode {
  if (error instanceof InvalidAddressError) {
    return ExitCodes.INVALID_ARGS;
  }
  if (error instanceof CredentialMissingError) {
    return ExitCodes.AUTHENTICATION_ERROR;
  }
  if (error instanceof FetchExhaustedError) {
    return error.lastError instanceof RateLimitError ? ExitCodes.RATE_LIMIT : ExitCodes.NETWORK_ERROR;
  }
  if (error instanceof ResponseValidationError) {
    return ExitCodes.VALIDATION_ERROR;
  }
  if (error instanceof ExportCancelledError) {
    return ExitCodes.CANCELLED;
  }
  return ExitCodes.GENERAL_ERROR;
}

/**
 * Print a CLI error on stderr with a contextual tip.
 */
export function printCliError(error: Error, exitCode: ExitCode): void {
  process.stderr.write(`\n${pc.red('✗')} Error: ${error.message}\n`);

  const tip = ERROR_TIPS[exitCode];
  if (tip) {
    process.stderr.write(`\n${pc.dim(tip)}\n`);
  }

  // In development, show full stack trace
  if (process.env['NODE_ENV'] === 'development' && error.stack) {
    process.stderr.write(`\n${pc.dim(error.stack)}\n\n`);
  }
}

/**
 * Print a CLI error and exit.
 */
export function displayCliError(error: Error, exitCode: ExitCode): never {
  printCliError(error, exitCode);
  process.exit(exitCode);
}
