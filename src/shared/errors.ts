/**
 * Shared error type for every ttlint failure.
 *
 * Lint violations are not errors; they are reported as diagnostics.
 */

export enum LintErrorCode {
  PATTERN_EMPTY = 'LINT_PATTERN_EMPTY',
  AUTOMATON_TOO_LARGE = 'LINT_AUTOMATON_TOO_LARGE',
  FILE_OPEN = 'LINT_FILE_OPEN',
  FILE_READ = 'LINT_FILE_READ',
  FILE_OPEN_WRITE = 'LINT_FILE_OPEN_WRITE',
  FILE_WRITE = 'LINT_FILE_WRITE',
  SINK_WRITE = 'LINT_SINK_WRITE',
  INVALID_ARGUMENTS = 'LINT_INVALID_ARGUMENTS',
}

/** Base error class for all ttlint operations. */
export class LintError extends Error {
  public readonly code: LintErrorCode;
  public readonly details: Record<string, unknown> | undefined;

  constructor(
    code: LintErrorCode,
    message: string,
    details?: Record<string, unknown>,
    cause?: unknown
  ) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'LintError';
    this.code = code;
    this.details = details;
  }
}

/** Returns the message of the underlying cause, if there is one. */
export function describeCause(error: unknown): string | undefined {
  if (!(error instanceof Error) || error.cause === undefined) return undefined;
  const cause = error.cause;
  return cause instanceof Error ? cause.message : String(cause);
}
