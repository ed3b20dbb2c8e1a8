/**
 * Unit tests for the pattern compiler and built-in rules
 */

import { describe, it, expect } from 'vitest';
import { compilePatterns } from '../patterns/pattern-compiler.js';
import { BUILTIN_PATTERNS, messageFor, ruleIdFor } from '../patterns/builtin-patterns.js';
import { LintError, LintErrorCode } from '../shared/errors.js';
import { captureError, enc } from './helpers.js';

describe('compilePatterns', () => {
  describe('Built-in Rules', () => {
    it('should place the six built-ins first, in fixed order', () => {
      const { patterns } = compilePatterns([]);

      expect(patterns.map((p) => p.text)).toEqual(['\n<<<<<<<', '\n=======', '\n>>>>>>>', ' \n', '\t\n', '\r']);
      expect(patterns.map((p) => p.index)).toEqual([0, 1, 2, 3, 4, 5]);
      expect(BUILTIN_PATTERNS.map((p) => p.rule)).toEqual([
        'conflict-start',
        'conflict-separator',
        'conflict-end',
        'trailing-space',
        'trailing-tab',
        'carriage-return',
      ]);
    });

    it('should anchor only the merge markers', () => {
      const { patterns } = compilePatterns([]);

      expect(patterns.map((p) => p.anchored)).toEqual([true, true, true, false, false, false]);
      expect(patterns.map((p) => p.endsWithNewline)).toEqual([false, false, false, true, true, false]);
    });

    it('should build a trie with shared prefixes', () => {
      // root + "\n" + 3 x 7 marker bytes + 2 + 2 + 1
      expect(compilePatterns([]).automaton.stateCount).toBe(28);
    });
  });

  describe('User Patterns', () => {
    it('should append user patterns after the built-ins, in order', () => {
      const { patterns, automaton } = compilePatterns(['FIXME', 'TODO']);

      expect(patterns).toHaveLength(8);
      expect(patterns[6]).toMatchObject({ index: 6, text: 'FIXME', reason: { kind: 'user', text: 'FIXME' } });
      expect(patterns[7]).toMatchObject({ index: 7, text: 'TODO', reason: { kind: 'user', text: 'TODO' } });
      expect(automaton.patternCount).toBe(8);
    });

    it('should keep duplicates and report the first of them', () => {
      const { patterns, automaton } = compilePatterns(['dup', 'dup']);

      expect(patterns).toHaveLength(8);
      expect(automaton.findAll(enc('a dup'))).toEqual([{ pattern: 6, start: 2, end: 5 }]);
    });

    it('should encode user patterns as UTF-8', () => {
      const { patterns } = compilePatterns(['naïve']);

      expect(patterns[6].bytes).toEqual(Uint8Array.of(0x6e, 0x61, 0xc3, 0xaf, 0x76, 0x65));
    });

    it('should treat a user pattern with a leading newline as anchored', () => {
      const { patterns } = compilePatterns(['\n#', 'end\n']);

      expect(patterns[6]).toMatchObject({ anchored: true, endsWithNewline: false });
      expect(patterns[7]).toMatchObject({ anchored: false, endsWithNewline: true });
    });
  });

  describe('Errors', () => {
    it('should reject an empty user pattern', () => {
      const error = captureError(() => compilePatterns(['ok', '']));

      expect(error).toBeInstanceOf(LintError);
      expect(error).toMatchObject({
        code: LintErrorCode.PATTERN_EMPTY,
        message: 'Pattern 2 is empty',
        details: { position: 1 },
      });
    });

    it('should surface an automaton that outgrows its state budget', () => {
      const error = captureError(() => compilePatterns([], { maxStates: 10 }));

      expect(error).toBeInstanceOf(LintError);
      expect(error).toMatchObject({ code: LintErrorCode.AUTOMATON_TOO_LARGE });
    });
  });
});

describe('Match Reasons', () => {
  it('should map built-in reasons to their fixed messages', () => {
    expect(messageFor({ kind: 'builtin', rule: 'conflict-start' })).toBe('merge conflict start marker');
    expect(messageFor({ kind: 'builtin', rule: 'conflict-separator' })).toBe('merge conflict separator');
    expect(messageFor({ kind: 'builtin', rule: 'conflict-end' })).toBe('merge conflict end marker');
    expect(messageFor({ kind: 'builtin', rule: 'trailing-space' })).toBe('trailing whitespace');
    expect(messageFor({ kind: 'builtin', rule: 'trailing-tab' })).toBe('trailing whitespace');
    expect(messageFor({ kind: 'builtin', rule: 'carriage-return' })).toBe('carriage return');
  });

  it('should use the literal text for user reasons', () => {
    expect(messageFor({ kind: 'user', text: 'FIXME' })).toBe('FIXME');
    expect(ruleIdFor({ kind: 'user', text: 'FIXME' })).toBe('user-pattern');
  });

  it('should describe the byte-order mark', () => {
    expect(messageFor({ kind: 'byte-order-mark' })).toBe('UTF-8 byte-order mark');
    expect(ruleIdFor({ kind: 'byte-order-mark' })).toBe('byte-order-mark');
  });
});
