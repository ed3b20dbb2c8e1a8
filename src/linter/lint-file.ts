/**
 * File-level linting: read a whole file, scan it, and rewrite it in place
 * when fix mode changed it. Every I/O failure is wrapped with the path and
 * aborts the run.
 */

import { closeSync, openSync, readFileSync, writeFileSync } from 'fs';
import { compilePatterns, type CompiledPatternSet } from '../patterns/pattern-compiler.js';
import type { DiagnosticSink } from '../reporter/reporter.js';
import { DEFAULT_CONFIG } from '../shared/config.js';
import { LintError, LintErrorCode } from '../shared/errors.js';
import { createLogger } from '../shared/logger.js';
import { bytesEqual } from './bytes.js';
import { lintBytes } from './linter.js';

const logger = createLogger('linter');

export interface FileLintResult {
  path: string;
  bad: boolean;
  /** The file was rewritten. */
  changed: boolean;
  diagnostics: number;
}

export interface LintFilesOptions {
  fix: boolean;
  maxStates?: number;
}

export interface LintSummary {
  bad: boolean;
  filesScanned: number;
  filesChanged: number;
  diagnostics: number;
}

function readContents(path: string): Buffer {
  let fd: number;
  try {
    fd = openSync(path, 'r');
  } catch (error) {
    throw new LintError(LintErrorCode.FILE_OPEN, `Failed to open file: ${path}`, { path }, error);
  }

  try {
    return readFileSync(fd);
  } catch (error) {
    throw new LintError(LintErrorCode.FILE_READ, `Failed to read file: ${path}`, { path }, error);
  } finally {
    closeSync(fd);
  }
}

function writeContents(path: string, contents: Uint8Array): void {
  let fd: number;
  try {
    fd = openSync(path, 'w');
  } catch (error) {
    throw new LintError(LintErrorCode.FILE_OPEN_WRITE, `Failed to open file for writing: ${path}`, { path }, error);
  }

  try {
    writeFileSync(fd, contents);
  } catch (error) {
    throw new LintError(LintErrorCode.FILE_WRITE, `Failed to write file: ${path}`, { path }, error);
  } finally {
    closeSync(fd);
  }
}

/** Lints one file, rewriting it only when fix mode produced different bytes. */
export function lintFile(
  path: string,
  compiled: CompiledPatternSet,
  sink: DiagnosticSink,
  fix: boolean
): FileLintResult {
  const contents = readContents(path);
  const outcome = lintBytes(path, contents, compiled, sink, fix);

  const changed = fix && !bytesEqual(outcome.output, contents);
  if (changed) {
    writeContents(path, outcome.output);
    logger.info({ path, before: contents.length, after: outcome.output.length }, 'Rewrote file');
  }

  logger.debug({ path, diagnostics: outcome.diagnostics, changed }, 'Linted file');
  return { path, bad: outcome.bad, changed, diagnostics: outcome.diagnostics };
}

/**
 * Compiles the pattern set once and lints each file in order.
 * The first error aborts; files after it are not touched.
 */
export function lintFiles(
  paths: readonly string[],
  userPatterns: readonly string[],
  sink: DiagnosticSink,
  options: LintFilesOptions
): LintSummary {
  const compiled = compilePatterns(userPatterns, {
    maxStates: options.maxStates ?? DEFAULT_CONFIG.maxStates,
  });

  const summary: LintSummary = { bad: false, filesScanned: 0, filesChanged: 0, diagnostics: 0 };
  for (const path of paths) {
    const result = lintFile(path, compiled, sink, options.fix);
    summary.bad ||= result.bad;
    summary.filesScanned++;
    if (result.changed) summary.filesChanged++;
    summary.diagnostics += result.diagnostics;
  }
  return summary;
}
