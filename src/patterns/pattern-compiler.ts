/**
 * PatternCompiler - builds one searchable structure from the built-in rules
 * followed by the caller's literal patterns.
 */

import { LintError, LintErrorCode } from '../shared/errors.js';
import { createLogger } from '../shared/logger.js';
import { AhoCorasick, type AhoCorasickOptions } from './aho-corasick.js';
import { BUILTIN_PATTERNS } from './builtin-patterns.js';
import type { CompiledPattern, MatchReason } from './types.js';

const logger = createLogger('patterns');

const NEWLINE = 0x0a;
const encoder = new TextEncoder();

export type CompileOptions = AhoCorasickOptions;

/** Built-in + user patterns and the automaton that finds them. */
export interface CompiledPatternSet {
  /** Built-ins first, then user patterns in the order supplied. */
  patterns: readonly CompiledPattern[];
  automaton: AhoCorasick;
}

function compilePattern(index: number, text: string, reason: MatchReason): CompiledPattern {
  const bytes = encoder.encode(text);
  return {
    index,
    text,
    bytes,
    reason,
    anchored: bytes.length > 0 && bytes[0] === NEWLINE,
    endsWithNewline: bytes.length > 0 && bytes[bytes.length - 1] === NEWLINE,
  };
}

/**
 * Compiles the built-in rules plus `userPatterns`.
 * Duplicates are allowed; an empty pattern fails construction.
 */
export function compilePatterns(userPatterns: readonly string[], options: CompileOptions = {}): CompiledPatternSet {
  const patterns: CompiledPattern[] = BUILTIN_PATTERNS.map((builtin, index) =>
    compilePattern(index, builtin.text, { kind: 'builtin', rule: builtin.rule })
  );
  userPatterns.forEach((text, position) => {
    if (text.length === 0) {
      throw new LintError(LintErrorCode.PATTERN_EMPTY, `Pattern ${position + 1} is empty`, { position });
    }
    patterns.push(compilePattern(patterns.length, text, { kind: 'user', text }));
  });

  const automaton = new AhoCorasick(
    patterns.map((p) => p.bytes),
    options
  );
  logger.debug(
    { builtinPatterns: BUILTIN_PATTERNS.length, userPatterns: userPatterns.length, states: automaton.stateCount },
    'Compiled pattern set'
  );

  return { patterns, automaton };
}
