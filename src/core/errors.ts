/**
 * Error types for policy-scan.
 */

/**
 * Process exit codes shared by the CLI and the CI action.
 */
export const EXIT_CODES = {
  PASS: 0,
  FAIL: 1,
  SETUP_ERROR: 2,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

/**
 * Raised when a scan cannot start: unusable root directory, malformed
 * rule set, or malformed configuration. No partial report exists when
 * this is thrown.
 */
export class SetupError extends Error {
  readonly exitCode = EXIT_CODES.SETUP_ERROR;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "SetupError";
  }
}

/**
 * Check whether a value is a SetupError.
 */
export function isSetupError(err: unknown): err is SetupError {
  return err instanceof SetupError;
}

/**
 * Extract a readable message from an unknown thrown value.
 */
export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
