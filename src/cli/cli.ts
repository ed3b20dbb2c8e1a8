/**
 * ttlint command line.
 *
 * runCli() returns the exit status instead of exiting so it can be driven
 * with in-memory I/O.
 */

import { lintFiles } from '../linter/lint-file.js';
import { StreamSink, STDERR_FD, type DiagnosticSink } from '../reporter/reporter.js';
import { resolveConfig, VERSION, type Environment, type OutputFormat } from '../shared/config.js';
import { describeCause } from '../shared/errors.js';
import { createLogger } from '../shared/logger.js';
import { parseCliArgs, USAGE } from './args.js';

const logger = createLogger('cli');

export const EXIT_OK = 0;
export const EXIT_LINT_FAILURE = 1;
export const EXIT_FATAL = 2;

export interface CliIo {
  /** Help and version text. */
  out(text: string): void;
  /** Fatal error messages. */
  err(text: string): void;
  /** Sink receiving diagnostics in the chosen format. */
  createSink(format: OutputFormat): DiagnosticSink;
  env: Environment;
}

export function processIo(): CliIo {
  return {
    out: (text) => {
      process.stdout.write(text);
    },
    err: (text) => {
      process.stderr.write(text);
    },
    createSink: (format) => new StreamSink(STDERR_FD, format),
    env: process.env,
  };
}

/** `Error: message`, plus the underlying cause when there is one. */
export function formatFatalError(error: unknown): string {
  const message = error instanceof Error ? error.message : String(error);
  const cause = describeCause(error);
  return cause === undefined
    ? `Error: ${message}\n`
    : `Error: ${message}\n\nCaused by:\n    ${cause}\n`;
}

export function runCli(argv: readonly string[], io: CliIo = processIo()): number {
  try {
    const args = parseCliArgs(argv);
    if (args.help) {
      io.out(USAGE);
      return EXIT_OK;
    }
    if (args.version) {
      io.out(`ttlint ${VERSION}\n`);
      return EXIT_OK;
    }

    const config = resolveConfig(
      { patterns: args.patterns, fix: args.fix, files: args.files, format: args.format },
      io.env
    );
    if (config.files.length === 0) {
      logger.warn('No files given; nothing to lint');
    }

    const summary = lintFiles(config.files, config.patterns, io.createSink(config.format), {
      fix: config.fix,
      maxStates: config.maxStates,
    });
    logger.debug({ ...summary }, 'Lint run complete');

    return summary.bad ? EXIT_LINT_FAILURE : EXIT_OK;
  } catch (error) {
    logger.debug({ err: error }, 'Lint run failed');
    io.err(formatFatalError(error));
    return EXIT_FATAL;
  }
}
