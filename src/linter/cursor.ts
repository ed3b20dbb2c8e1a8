import { NEWLINE, bytesSinceLastNewline, countByte } from './bytes.js';

/** Scan position: byte offset plus its 1-based line and column. */
export interface Cursor {
  offset: number;
  line: number;
  column: number;
}

export const START_CURSOR: Cursor = { offset: 0, line: 1, column: 1 };

/**
 * Moves the cursor forward to `target`, looking only at the bytes in between.
 * `target` must not be behind `cursor.offset`.
 */
export function advanceCursor(contents: Uint8Array, cursor: Cursor, target: number): Cursor {
  const lines = countByte(contents, NEWLINE, cursor.offset, target);
  const tail = bytesSinceLastNewline(contents, cursor.offset, target);
  return {
    offset: target,
    line: cursor.line + lines,
    column: lines === 0 ? cursor.column + tail : tail + 1,
  };
}
