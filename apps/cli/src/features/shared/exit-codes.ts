/**
 * Semantic exit codes for the CLI.
 * Following POSIX conventions.
 */
export const ExitCodes = {
  /** Successful execution */
  SUCCESS: 0,

  /** General error (catch-all) */
  GENERAL_ERROR: 1,

  /** Invalid command arguments or options */
  INVALID_ARGS: 2,

  /** No rate (or file) for the request */
  NOT_FOUND: 4,

  /** Every source failed to respond */
  NETWORK_ERROR: 6,

  /** Database error */
  DATABASE_ERROR: 7,

  /** Input data failed validation (CSV content) */
  VALIDATION_ERROR: 8,
} as const;

export type ExitCode = (typeof ExitCodes)[keyof typeof ExitCodes];

const ERROR_CODES: Record<ExitCode, string> = {
  0: 'SUCCESS',
  1: 'GENERAL_ERROR',
  2: 'INVALID_ARGS',
  4: 'NOT_FOUND',
  6: 'NETWORK_ERROR',
  7: 'DATABASE_ERROR',
  8: 'VALIDATION_ERROR',
};

/**
 * Map exit code to error code string.
 */
export function exitCodeToErrorCode(exitCode: ExitCode): string {
  return ERROR_CODES[exitCode];
}
