/**
 * Pattern Module Types
 */

/** Identifiers of the built-in rules, in scan order. */
export type BuiltinRule =
  | 'conflict-start'
  | 'conflict-separator'
  | 'conflict-end'
  | 'trailing-space'
  | 'trailing-tab'
  | 'carriage-return';

/** Rule id of the byte-order-mark check, which runs before the pattern scan. */
export const BYTE_ORDER_MARK_RULE = 'byte-order-mark';

/** Rule id shared by every user-supplied literal. */
export const USER_PATTERN_RULE = 'user-pattern';

export type RuleId = BuiltinRule | typeof BYTE_ORDER_MARK_RULE | typeof USER_PATTERN_RULE;

/** Why a span was flagged. */
export type MatchReason =
  | { kind: 'builtin'; rule: BuiltinRule }
  | { kind: 'byte-order-mark' }
  | { kind: 'user'; text: string };

export interface BuiltinPattern {
  rule: BuiltinRule;
  /** Literal text to search for. A leading newline anchors it to a line start. */
  text: string;
  message: string;
}

/** One entry of the combined built-in + user pattern list. */
export interface CompiledPattern {
  /** Position in the combined list; lower wins when two matches start together. */
  index: number;
  text: string;
  bytes: Uint8Array;
  reason: MatchReason;
  /** Starts with a newline: reported one byte later, newline restored on fix. */
  anchored: boolean;
  /** Ends with a newline: the fix keeps one newline in place of the span. */
  endsWithNewline: boolean;
}

/** A non-overlapping occurrence found by the automaton. */
export interface PatternMatch {
  pattern: number;
  /** Inclusive byte offset. */
  start: number;
  /** Exclusive byte offset. */
  end: number;
}
