/**
 * Byte-level Aho-Corasick automaton with leftmost-first match semantics.
 *
 * Matches are reported left to right and never overlap. Among candidates the
 * earliest start wins; for equal starts the pattern given first wins, whatever
 * its length.
 */

import { DEFAULT_MAX_STATES } from '../shared/config.js';
import { LintError, LintErrorCode } from '../shared/errors.js';
import type { PatternMatch } from './types.js';

export interface AhoCorasickOptions {
  /** Construction fails once the trie would grow past this many states. */
  maxStates?: number;
}

interface AutomatonState {
  next: Map<number, number>;
  fail: number;
  /** Length of the prefix this state spells. */
  depth: number;
  /** Patterns ending here, including those inherited through failure links, lowest index first. */
  outputs: number[];
}

const ROOT = 0;

function createState(depth: number): AutomatonState {
  return { next: new Map(), fail: ROOT, depth, outputs: [] };
}

export class AhoCorasick {
  private readonly states: AutomatonState[] = [createState(0)];
  private readonly lengths: number[];

  constructor(patterns: readonly Uint8Array[], options: AhoCorasickOptions = {}) {
    const maxStates = options.maxStates ?? DEFAULT_MAX_STATES;
    this.lengths = patterns.map((p) => p.length);

    patterns.forEach((bytes, index) => this.insert(bytes, index, maxStates));
    this.buildFailureLinks();
  }

  /** Number of patterns the automaton was built from. */
  get patternCount(): number {
    return this.lengths.length;
  }

  /** Number of trie states, root included. */
  get stateCount(): number {
    return this.states.length;
  }

  /** Yields every non-overlapping leftmost-first match in one pass. */
  *findIter(haystack: Uint8Array): Generator<PatternMatch, void, undefined> {
    let state = ROOT;
    let pos = 0;
    let candidate: PatternMatch | null = null;

    while (true) {
      if (pos < haystack.length) {
        state = this.step(state, haystack[pos]);
        pos++;
        const node = this.states[state];
        candidate = this.pickLeftmost(candidate, node, pos);
        // Any match still to come starts at or after pos - depth.
        if (candidate === null || candidate.start >= pos - node.depth) continue;
      } else if (candidate === null) {
        return;
      }

      yield candidate;
      pos = candidate.end;
      state = ROOT;
      candidate = null;
    }
  }

  findAll(haystack: Uint8Array): PatternMatch[] {
    return [...this.findIter(haystack)];
  }

  private insert(bytes: Uint8Array, index: number, maxStates: number): void {
    if (bytes.length === 0) {
      throw new LintError(LintErrorCode.PATTERN_EMPTY, `Pattern #${index} is empty`, { pattern: index });
    }

    let current = ROOT;
    for (const byte of bytes) {
      let next = this.states[current].next.get(byte);
      if (next === undefined) {
        if (this.states.length >= maxStates) {
          throw new LintError(
            LintErrorCode.AUTOMATON_TOO_LARGE,
            `Pattern set needs more than ${maxStates} automaton states`,
            { maxStates, pattern: index }
          );
        }
        next = this.states.length;
        this.states.push(createState(this.states[current].depth + 1));
        this.states[current].next.set(byte, next);
      }
      current = next;
    }
    this.states[current].outputs.push(index);
  }

  private buildFailureLinks(): void {
    const queue: number[] = [];
    for (const child of this.states[ROOT].next.values()) {
      queue.push(child);
    }

    for (let head = 0; head < queue.length; head++) {
      const parent = this.states[queue[head]];
      for (const [byte, child] of parent.next) {
        const node = this.states[child];
        node.fail = this.step(parent.fail, byte);
        const inherited = this.states[node.fail].outputs;
        if (inherited.length > 0) {
          node.outputs = [...node.outputs, ...inherited].sort((a, b) => a - b);
        }
        queue.push(child);
      }
    }
  }

  private step(state: number, byte: number): number {
    let current = state;
    while (true) {
      const next = this.states[current].next.get(byte);
      if (next !== undefined) return next;
      if (current === ROOT) return ROOT;
      current = this.states[current].fail;
    }
  }

  private pickLeftmost(best: PatternMatch | null, node: AutomatonState, end: number): PatternMatch | null {
    let winner = best;
    for (const pattern of node.outputs) {
      const start = end - this.lengths[pattern];
      if (winner === null || start < winner.start || (start === winner.start && pattern < winner.pattern)) {
        winner = { pattern, start, end };
      }
    }
    return winner;
  }
}
