/**
 * ttlint - Main Entry Point
 *
 * Exports the public API for use as a library.
 */

// Patterns Module
export {
  AhoCorasick,
  compilePatterns,
  BUILTIN_PATTERNS,
  BYTE_ORDER_MARK,
  BYTE_ORDER_MARK_MESSAGE,
  BYTE_ORDER_MARK_RULE,
  USER_PATTERN_RULE,
  messageFor,
  ruleIdFor,
} from './patterns/index.js';
export type {
  AhoCorasickOptions,
  CompileOptions,
  CompiledPatternSet,
  BuiltinPattern,
  BuiltinRule,
  CompiledPattern,
  MatchReason,
  PatternMatch,
  RuleId,
} from './patterns/index.js';

// Linter Module
export { lintBytes, lintPatterns, lintFile, lintFiles, START_CURSOR, advanceCursor } from './linter/index.js';
export type { LintOutcome, FileLintResult, LintFilesOptions, LintSummary, Cursor } from './linter/index.js';

// Reporter Module
export {
  CollectingSink,
  StreamSink,
  STDERR_FD,
  formatDiagnostic,
  formatDiagnosticJson,
  formatterFor,
} from './reporter/index.js';
export type { Diagnostic, DiagnosticSink } from './reporter/index.js';

// CLI Module
export { runCli, parseCliArgs, EXIT_OK, EXIT_LINT_FAILURE, EXIT_FATAL } from './cli/index.js';
export type { CliIo, CliArgs } from './cli/index.js';

// Shared
export { LintError, LintErrorCode } from './shared/errors.js';
export { DEFAULT_CONFIG, DEFAULT_MAX_STATES, resolveConfig, VERSION } from './shared/config.js';
export type { LinterConfig, OutputFormat, Environment } from './shared/config.js';
