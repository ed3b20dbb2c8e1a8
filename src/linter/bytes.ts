/**
 * Byte helpers for raw file contents.
 */

export const NEWLINE = 0x0a;

/** Count occurrences of a byte in `[start, end)`. */
export function countByte(bytes: Uint8Array, byte: number, start = 0, end: number = bytes.length): number {
  let count = 0;
  for (let i = start; i < end; i++) {
    if (bytes[i] === byte) count++;
  }
  return count;
}

/**
 * Bytes between the last newline in `[start, end)` and `end`.
 * Without a newline in the range this is the whole range length.
 */
export function bytesSinceLastNewline(bytes: Uint8Array, start: number, end: number): number {
  let i = end;
  while (i > start && bytes[i - 1] !== NEWLINE) i--;
  return end - i;
}

export function startsWith(bytes: Uint8Array, prefix: Uint8Array): boolean {
  if (bytes.length < prefix.length) return false;
  for (let i = 0; i < prefix.length; i++) {
    if (bytes[i] !== prefix[i]) return false;
  }
  return true;
}

export function bytesEqual(a: Uint8Array, b: Uint8Array): boolean {
  return a.length === b.length && startsWith(a, b);
}

/** Joins chunks into one new buffer. */
export function concatBytes(chunks: readonly Uint8Array[]): Uint8Array {
  let length = 0;
  for (const chunk of chunks) length += chunk.length;

  const out = new Uint8Array(length);
  let offset = 0;
  for (const chunk of chunks) {
    out.set(chunk, offset);
    offset += chunk.length;
  }
  return out;
}
