/**
 * Linter Module - Public API
 */

export { lintBytes, lintPatterns } from './linter.js';
export type { LintOutcome } from './linter.js';
export { lintFile, lintFiles } from './lint-file.js';
export type { FileLintResult, LintFilesOptions, LintSummary } from './lint-file.js';
export { START_CURSOR, advanceCursor } from './cursor.js';
export type { Cursor } from './cursor.js';
