/**
 * Linter - single-pass scan that reports every match and, in fix mode,
 * builds the rewritten contents in the same pass.
 */

import { compilePatterns, type CompiledPatternSet } from '../patterns/pattern-compiler.js';
import { BYTE_ORDER_MARK, BYTE_ORDER_MARK_MESSAGE, messageFor, ruleIdFor } from '../patterns/builtin-patterns.js';
import { BYTE_ORDER_MARK_RULE } from '../patterns/types.js';
import type { DiagnosticSink } from '../reporter/reporter.js';
import { NEWLINE, concatBytes, startsWith } from './bytes.js';
import { START_CURSOR, advanceCursor } from './cursor.js';

/** Result of linting one buffer. */
export interface LintOutcome {
  /** At least one diagnostic was reported. */
  bad: boolean;
  /** Bytes to persist: rewritten in fix mode, otherwise the input itself. */
  output: Uint8Array;
  /** Number of diagnostics reported. */
  diagnostics: number;
}

const NEWLINE_BYTES = Uint8Array.of(NEWLINE);

/**
 * Scans `contents` once with the compiled pattern set.
 *
 * Anchored patterns are reported at the byte after their leading newline, and
 * that newline stays in the output. A pattern that ends in a newline leaves a
 * single newline behind.
 */
export function lintPatterns(
  path: string,
  contents: Uint8Array,
  compiled: CompiledPatternSet,
  sink: DiagnosticSink,
  fix: boolean
): LintOutcome {
  const chunks: Uint8Array[] = [];
  let lastEnd = 0;
  let cursor = START_CURSOR;
  let diagnostics = 0;

  for (const match of compiled.automaton.findIter(contents)) {
    const pattern = compiled.patterns[match.pattern];
    const start = pattern.anchored ? match.start + 1 : match.start;

    cursor = advanceCursor(contents, cursor, start);
    sink.report({
      path,
      line: cursor.line,
      column: cursor.column,
      ruleId: ruleIdFor(pattern.reason),
      message: messageFor(pattern.reason),
      reason: pattern.reason,
    });
    diagnostics++;

    if (fix) {
      chunks.push(contents.subarray(lastEnd, start));
      if (pattern.endsWithNewline) {
        chunks.push(NEWLINE_BYTES);
      }
      lastEnd = match.end;
    }
  }

  if (!fix) {
    return { bad: diagnostics > 0, output: contents, diagnostics };
  }

  chunks.push(contents.subarray(lastEnd));
  return { bad: diagnostics > 0, output: concatBytes(chunks), diagnostics };
}

/**
 * Full check of one buffer: the byte-order mark, then the pattern scan.
 *
 * A leading BOM is reported at 1:1. In fix mode it is dropped before the
 * pattern scan; otherwise the scan sees it, so columns on the first line
 * differ between the two modes.
 */
export function lintBytes(
  path: string,
  contents: Uint8Array,
  patterns: CompiledPatternSet | readonly string[],
  sink: DiagnosticSink,
  fix: boolean
): LintOutcome {
  const compiled = 'automaton' in patterns ? patterns : compilePatterns(patterns);

  const hasBom = startsWith(contents, BYTE_ORDER_MARK);
  if (hasBom) {
    sink.report({
      path,
      line: 1,
      column: 1,
      ruleId: BYTE_ORDER_MARK_RULE,
      message: BYTE_ORDER_MARK_MESSAGE,
      reason: { kind: 'byte-order-mark' },
    });
  }

  const body = hasBom && fix ? contents.subarray(BYTE_ORDER_MARK.length) : contents;
  const outcome = lintPatterns(path, body, compiled, sink, fix);

  return {
    bad: hasBom || outcome.bad,
    output: outcome.output,
    diagnostics: outcome.diagnostics + (hasBom ? 1 : 0),
  };
}
