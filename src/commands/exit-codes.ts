/**
 * CLI exit codes.
 */
export const EXIT = {
  SUCCESS: 0,
  SAMPLES_FAILING: 1,
  REGRESSION_REJECTED: 2,
  INVALID_ARGS: 3,
  GRAMMAR_LOAD_FAILED: 4,
  CANCELLED: 130,
} as const;

export type ExitCode = (typeof EXIT)[keyof typeof EXIT];

/** Exit code for a command error code. */
export function exitForError(code: string): ExitCode {
  switch (code) {
    case "GRAMMAR_LOAD_FAILED":
      return EXIT.GRAMMAR_LOAD_FAILED;
    case "RUN_CANCELLED":
      return EXIT.CANCELLED;
    case "REGRESSION_REJECTED":
      return EXIT.REGRESSION_REJECTED;
    default:
      return EXIT.INVALID_ARGS;
  }
}
