/**
 * CLI Module - Public API
 */

export { runCli, processIo, formatFatalError, EXIT_OK, EXIT_LINT_FAILURE, EXIT_FATAL } from './cli.js';
export type { CliIo } from './cli.js';
export { parseCliArgs, USAGE } from './args.js';
export type { CliArgs } from './args.js';
