import { getLogger } from '@sol-ledger/logger';

import { ExitCodes, exitWithCode, type ExitCode } from './exit-codes.js';

const logger = getLogger('command-runtime');

/**
 * Manages SIGINT handling and cleanup for CLI commands.
 *
 * - `onCleanup()`: LIFO stack, runs during dispose
 * - `onAbort()`: SIGINT: fn() sync → await dispose → exit(CANCELLED)
 * - `dispose()`: remove SIGINT, run stack. Idempotent. Throws on cleanup failures.
 */
export class CommandContext {
  exitCode: ExitCode = ExitCodes.SUCCESS;

  private _disposed = false;
  private cleanupStack: (() => Promise<void>)[] = [];
  private sigintHandler: (() => void) | undefined;

  /**
   * Register a cleanup function. Runs in LIFO order during dispose().
   */
  onCleanup(fn: () => Promise<void>): void {
    this.cleanupStack.push(fn);
  }

  /**
   * Register a SIGINT handler. On Ctrl-C: fn() runs synchronously,
   * then dispose runs, then the process exits with the CANCELLED code.
   */
  onAbort(fn: () => void): void {
    // Remove any previous handler
    if (this.sigintHandler) {
      process.off('SIGINT', this.sigintHandler);
    }

    this.sigintHandler = () => {
      // Remove to prevent double-fire
      if (this.sigintHandler) {
        process.off('SIGINT', this.sigintHandler);
      }

      try {
        fn();
      } catch (error) {
        logger.error({ error }, 'Abort callback threw during SIGINT');
      }

      // Await dispose before exiting so cleanup actually completes
      this.dispose()
        .catch((error: unknown) => {
          logger.error({ error }, 'Error during abort dispose');
        })
        .finally(() => {
          exitWithCode(ExitCodes.CANCELLED);
        });
    };

    process.on('SIGINT', this.sigintHandler);
  }

  /**
   * Remove SIGINT handler, run cleanup stack (LIFO).
   * Idempotent, safe to call multiple times.
   */
  async dispose(): Promise<void> {
    if (this._disposed) return;
    this._disposed = true;

    if (this.sigintHandler) {
      process.off('SIGINT', this.sigintHandler);
      this.sigintHandler = undefined;
    }

    // Continue on failure, collect errors
    const errors: Error[] = [];
    let fn = this.cleanupStack.pop();
    while (fn) {
      try {
        await fn();
      } catch (error) {
        const failure = error instanceof Error ? error : new Error(String(error));
        logger.error({ error: failure }, 'Cleanup function failed');
        errors.push(failure);
      }
      fn = this.cleanupStack.pop();
    }

    if (errors.length === 1 && errors[0]) {
      throw errors[0];
    }
    if (errors.length > 1) {
      throw new AggregateError(errors, `${errors.length} cleanup functions failed`);
    }
  }
}

/**
 * Run a CLI command with automatic resource cleanup.
 *
 * Does NOT catch fn errors; they propagate to the caller.
 * Dispose always runs. If both fn and dispose fail, the fn error takes priority
 * (dispose error is logged). If only dispose fails, that error propagates.
 */
export async function runCommand(fn: (ctx: CommandContext) => Promise<void>): Promise<void> {
  const ctx = new CommandContext();
  let fnError: unknown;

  try {
    await fn(ctx);
  } catch (error) {
    fnError = error;
  }

  try {
    await ctx.dispose();
  } catch (disposeError) {
    if (fnError) {
      logger.error({ error: disposeError }, 'Cleanup failed (original error takes priority)');
    } else {
      fnError = disposeError;
    }
  }

  if (ctx.exitCode !== ExitCodes.SUCCESS) {
    exitWithCode(ctx.exitCode);
  }

  if (fnError) {
    if (fnError instanceof Error) throw fnError;
    throw new Error(typeof fnError === 'string' ? fnError : 'Command failed');
  }
}
