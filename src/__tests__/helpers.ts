/**
 * Shared test helpers.
 */

const encoder = new TextEncoder();
const decoder = new TextDecoder();

export const enc = (text: string): Uint8Array => encoder.encode(text);

export const dec = (bytes: Uint8Array): string => decoder.decode(bytes);

/** Runs `fn` and returns what it threw; fails the test when nothing was thrown. */
export function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('Expected function to throw');
}
