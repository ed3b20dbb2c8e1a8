/**
 * Reporter Module - Public API
 */

export {
  CollectingSink,
  StreamSink,
  STDERR_FD,
  formatDiagnostic,
  formatDiagnosticJson,
  formatterFor,
} from './reporter.js';
export type { Diagnostic, DiagnosticSink } from './reporter.js';
