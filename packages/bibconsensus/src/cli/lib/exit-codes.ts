/**
 * CLI Exit Codes
 *
 * @module cli/lib/exit-codes
 */

export const EXIT_CODES = {
  SUCCESS: 0,
  /** Finished, but some fields could not be processed */
  WARNINGS: 1,
  ERRORS: 2,
  CONFIG_ERROR: 3,
  INPUT_ERROR: 4,
  USER_CANCELLED: 10,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];
