/**
 * Semantic exit codes for the CLI.
 * Following POSIX conventions and best practices.
 */
export const ExitCodes = {
  /** Successful execution */
  SUCCESS: 0,

  /** General error (catch-all) */
  GENERAL_ERROR: 1,

  /** Invalid command arguments or options */
  INVALID_ARGS: 2,

  /** Missing or rejected API credential */
  AUTHENTICATION_ERROR: 3,

  /** Rate limit exceeded on every retry */
  RATE_LIMIT: 5,

  /** Network or connectivity error */
  NETWORK_ERROR: 6,

  /** Validation error (provider response failed validation) */
  VALIDATION_ERROR: 8,

  /** Operation cancelled by user */
  CANCELLED: 9,
} as const;

export type ExitCode = (typeof ExitCodes)[keyof typeof ExitCodes];

/**
 * Exit the process with a specific exit code.
 * Use this instead of process.exit() for better tracking.
 */
export function exitWithCode(code: ExitCode): never {
  process.exit(code);
}
