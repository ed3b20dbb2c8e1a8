/**
 * Diagnostic sinks - where the linter sends each finding.
 *
 * A sink must either take the whole line or throw; a throw aborts the scan.
 */

import { writeSync } from 'fs';
import type { MatchReason, RuleId } from '../patterns/types.js';
import type { OutputFormat } from '../shared/config.js';
import { LintError, LintErrorCode } from '../shared/errors.js';

// ═══════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════

/** One finding, located at its 1-based line and byte column. */
export interface Diagnostic {
  /** File path as given by the caller. */
  path: string;
  line: number;
  column: number;
  ruleId: RuleId;
  message: string;
  reason: MatchReason;
}

export interface DiagnosticSink {
  report(diagnostic: Diagnostic): void;
}

// ═══════════════════════════════════════════════════════════════
// FORMATTING
// ═══════════════════════════════════════════════════════════════

/** `path:line:col: message` */
export function formatDiagnostic(diagnostic: Diagnostic): string {
  return `${diagnostic.path}:${diagnostic.line}:${diagnostic.column}: ${diagnostic.message}`;
}

/** One JSON object, no trailing newline. */
export function formatDiagnosticJson(diagnostic: Diagnostic): string {
  return JSON.stringify({
    path: diagnostic.path,
    line: diagnostic.line,
    column: diagnostic.column,
    rule: diagnostic.ruleId,
    message: diagnostic.message,
  });
}

export function formatterFor(format: OutputFormat): (diagnostic: Diagnostic) => string {
  return format === 'jsonl' ? formatDiagnosticJson : formatDiagnostic;
}

// ═══════════════════════════════════════════════════════════════
// SINKS
// ═══════════════════════════════════════════════════════════════

export const STDERR_FD = 2;

/** Writes one formatted line per diagnostic to a file descriptor, synchronously. */
export class StreamSink implements DiagnosticSink {
  private readonly fd: number;
  private readonly format: (diagnostic: Diagnostic) => string;

  constructor(fd: number = STDERR_FD, format: OutputFormat = 'text') {
    this.fd = fd;
    this.format = formatterFor(format);
  }

  report(diagnostic: Diagnostic): void {
    const line = Buffer.from(`${this.format(diagnostic)}\n`, 'utf8');
    try {
      let offset = 0;
      while (offset < line.length) {
        offset += writeSync(this.fd, line, offset, line.length - offset);
      }
    } catch (error) {
      throw new LintError(
        LintErrorCode.SINK_WRITE,
        `Failed to write diagnostic for ${diagnostic.path}`,
        { fd: this.fd, path: diagnostic.path },
        error
      );
    }
  }
}

/** Keeps diagnostics in memory. */
export class CollectingSink implements DiagnosticSink {
  readonly diagnostics: Diagnostic[] = [];

  report(diagnostic: Diagnostic): void {
    this.diagnostics.push(diagnostic);
  }

  /** The diagnostics as text lines. */
  lines(): string[] {
    return this.diagnostics.map(formatDiagnostic);
  }

  clear(): void {
    this.diagnostics.length = 0;
  }
}
