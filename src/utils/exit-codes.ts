/**
 * Process exit codes.
 *
 * An empty listing is a success (0). 66 (no input) is reserved and never
 * returned.
 */
export const ExitCode = {
  Success: 0,
  Failure: 1,
  Usage: 2,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];
