/**
 * Linter configuration: defaults, command-line overrides and environment.
 *
 * Environment variables:
 *   TTLINT_FORMAT  - Diagnostic format when --format is absent (text, jsonl)
 *   LOG_LEVEL      - Logging level (trace, debug, info, warn, error, fatal, silent)
 */

import { LintError, LintErrorCode } from './errors.js';

export const VERSION = '0.1.0';

/** Default upper bound on automaton states. */
export const DEFAULT_MAX_STATES = 1_000_000;

export type OutputFormat = 'text' | 'jsonl';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['text', 'jsonl'];

export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface LinterConfig {
  /** Extra literal patterns, in the order given. */
  patterns: string[];
  /** Remove matches and rewrite changed files. */
  fix: boolean;
  /** Files to lint, in the order given. */
  files: string[];
  /** Diagnostic output format. */
  format: OutputFormat;
  /** Upper bound on automaton states. */
  maxStates: number;
}

export const DEFAULT_CONFIG: LinterConfig = {
  patterns: [],
  fix: false,
  files: [],
  format: 'text',
  maxStates: DEFAULT_MAX_STATES,
};

export type Environment = Record<string, string | undefined>;

export function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some((format) => format === value);
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export function parseOutputFormat(value: string, source: string): OutputFormat {
  if (isOutputFormat(value)) return value;
  throw new LintError(
    LintErrorCode.INVALID_ARGUMENTS,
    `Unsupported format '${value}' from ${source} (expected one of: ${OUTPUT_FORMATS.join(', ')})`,
    { format: value, source }
  );
}

/** Log level from LOG_LEVEL; unknown values fall back to 'warn'. */
export function resolveLogLevel(env: Environment): LogLevel {
  const level = env['LOG_LEVEL']?.trim().toLowerCase();
  return level && isLogLevel(level) ? level : 'warn';
}

/**
 * Merges defaults, environment and explicit overrides.
 * Explicit overrides win over the environment.
 */
export function resolveConfig(overrides: Partial<LinterConfig>, env: Environment = {}): LinterConfig {
  const envFormat = env['TTLINT_FORMAT']?.trim();
  const format =
    overrides.format ??
    (envFormat ? parseOutputFormat(envFormat, 'TTLINT_FORMAT') : DEFAULT_CONFIG.format);

  return {
    patterns: [...(overrides.patterns ?? DEFAULT_CONFIG.patterns)],
    fix: overrides.fix ?? DEFAULT_CONFIG.fix,
    files: [...(overrides.files ?? DEFAULT_CONFIG.files)],
    format,
    maxStates: overrides.maxStates ?? DEFAULT_CONFIG.maxStates,
  };
}
