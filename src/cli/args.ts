import { parseArgs } from 'node:util';

import { parseOutputFormat, type OutputFormat } from '../shared/config.js';
import { LintError, LintErrorCode } from '../shared/errors.js';

export interface CliArgs {
  help: boolean;
  version: boolean;
  /** Extra literal patterns, in the order given. */
  patterns: string[];
  fix: boolean;
  /** Present only when --format was given. */
  format: OutputFormat | undefined;
  files: string[];
}

export const USAGE = `ttlint - tiny text linter

Usage:
  ttlint [options] <file...>

Options:
  -p, --pattern <text>   Additional literal pattern to report (repeatable)
  -f, --fix              Remove every match and rewrite changed files
      --format <format>  Diagnostic format: text (default) or jsonl
  -h, --help             Show this help message
  -v, --version          Show the version

Built-in checks:
  UTF-8 byte-order mark, merge conflict markers, trailing whitespace,
  carriage returns

Environment variables:
  TTLINT_FORMAT   Diagnostic format when --format is absent
  LOG_LEVEL       Logging level (trace, debug, info, warn, error, fatal, silent)

Exit status:
  0  no findings
  1  at least one finding
  2  error (unreadable file, invalid pattern, bad arguments)

Examples:
  ttlint README.md src/main.c
  ttlint --fix -p FIXME -p XXX notes.txt
`;

function parseErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function parseRawArgs(argv: readonly string[]) {
  try {
    return parseArgs({
      args: [...argv],
      strict: true,
      allowPositionals: true,
      options: {
        pattern: { type: 'string', short: 'p', multiple: true },
        fix: { type: 'boolean', short: 'f' },
        format: { type: 'string' },
        help: { type: 'boolean', short: 'h' },
        version: { type: 'boolean', short: 'v' },
      } as const,
    });
  } catch (error) {
    throw new LintError(LintErrorCode.INVALID_ARGUMENTS, parseErrorMessage(error), { argv: [...argv] }, error);
  }
}

export function parseCliArgs(argv: readonly string[]): CliArgs {
  const { values, positionals } = parseRawArgs(argv);
  return {
    help: values.help ?? false,
    version: values.version ?? false,
    patterns: values.pattern ?? [],
    fix: values.fix ?? false,
    format: values.format === undefined ? undefined : parseOutputFormat(values.format, '--format'),
    files: positionals,
  };
}
