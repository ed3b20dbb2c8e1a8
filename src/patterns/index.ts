/**
 * Patterns Module - Public API
 */

export { AhoCorasick } from './aho-corasick.js';
export type { AhoCorasickOptions } from './aho-corasick.js';
export { compilePatterns } from './pattern-compiler.js';
export type { CompileOptions, CompiledPatternSet } from './pattern-compiler.js';
export {
  BUILTIN_PATTERNS,
  BYTE_ORDER_MARK,
  BYTE_ORDER_MARK_MESSAGE,
  messageFor,
  ruleIdFor,
} from './builtin-patterns.js';
export { BYTE_ORDER_MARK_RULE, USER_PATTERN_RULE } from './types.js';
export type {
  BuiltinPattern,
  BuiltinRule,
  CompiledPattern,
  MatchReason,
  PatternMatch,
  RuleId,
} from './types.js';
