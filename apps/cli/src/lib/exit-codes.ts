/**
 * Process exit codes.
 */
export const EXIT_CODES = {
  SUCCESS: 0,
  UNEXPECTED_ERROR: 1,
  INVALID_ARGUMENTS: 2,
  NO_CREDENTIALS: 3,
  MISSING_INPUT: 4,
  MISSING_TEMPLATE: 5,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];
