/**
 * Built-in rules. Their order is the scan priority and must not change.
 */

import { BYTE_ORDER_MARK_RULE, USER_PATTERN_RULE } from './types.js';
import type { BuiltinPattern, BuiltinRule, MatchReason, RuleId } from './types.js';

const BUILTIN_MESSAGES: Record<BuiltinRule, string> = {
  'conflict-start': 'merge conflict start marker',
  'conflict-separator': 'merge conflict separator',
  'conflict-end': 'merge conflict end marker',
  'trailing-space': 'trailing whitespace',
  'trailing-tab': 'trailing whitespace',
  'carriage-return': 'carriage return',
};

function builtin(rule: BuiltinRule, text: string): BuiltinPattern {
  return { rule, text, message: BUILTIN_MESSAGES[rule] };
}

export const BUILTIN_PATTERNS: readonly BuiltinPattern[] = [
  builtin('conflict-start', '\n<<<<<<<'),
  builtin('conflict-separator', '\n======='),
  builtin('conflict-end', '\n>>>>>>>'),
  builtin('trailing-space', ' \n'),
  builtin('trailing-tab', '\t\n'),
  builtin('carriage-return', '\r'),
];

export const BYTE_ORDER_MARK = Uint8Array.of(0xef, 0xbb, 0xbf);

export const BYTE_ORDER_MARK_MESSAGE = 'UTF-8 byte-order mark';

/** Diagnostic message for a match reason. */
export function messageFor(reason: MatchReason): string {
  switch (reason.kind) {
    case 'builtin':
      return BUILTIN_MESSAGES[reason.rule];
    case 'byte-order-mark':
      return BYTE_ORDER_MARK_MESSAGE;
    case 'user':
      return reason.text;
  }
}

/** Rule id reported for a match reason. */
export function ruleIdFor(reason: MatchReason): RuleId {
  switch (reason.kind) {
    case 'builtin':
      return reason.rule;
    case 'byte-order-mark':
      return BYTE_ORDER_MARK_RULE;
    case 'user':
      return USER_PATTERN_RULE;
  }
}
