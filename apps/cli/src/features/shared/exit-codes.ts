/**
 * Semantic exit codes for the CLI.
 * Following POSIX conventions.
 */
export const ExitCodes = {
  /** Successful execution */
  SUCCESS: 0,

  /** General error (catch-all, including unreadable input) */
  GENERAL_ERROR: 1,

  /** Invalid command arguments or options */
  INVALID_ARGS: 2,

  /** Input file not found */
  NOT_FOUND: 4,

  /** Input is not a transaction CSV (missing header or columns) */
  VALIDATION_ERROR: 8,

  /** Configuration error */
  CONFIG_ERROR: 11,
} as const;

export type ExitCode = (typeof ExitCodes)[keyof typeof ExitCodes];

/**
 * Exit the process with a specific exit code.
 * Use this instead of process.exit() for better tracking.
 */
export function exitWithCode(code: ExitCode): never {
  process.exit(code);
}
