/**
 * Unit tests for diagnostic formatting and sinks
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { closeSync, mkdtempSync, openSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import {
  CollectingSink,
  StreamSink,
  formatDiagnostic,
  formatDiagnosticJson,
  formatterFor,
  type Diagnostic,
} from '../reporter/reporter.js';
import { LintError, LintErrorCode } from '../shared/errors.js';
import { captureError } from './helpers.js';

const trailing: Diagnostic = {
  path: 'src/app.ts',
  line: 3,
  column: 14,
  ruleId: 'trailing-space',
  message: 'trailing whitespace',
  reason: { kind: 'builtin', rule: 'trailing-space' },
};

const userMatch: Diagnostic = {
  path: 'notes "draft".md',
  line: 1,
  column: 1,
  ruleId: 'user-pattern',
  message: 'say "hi"',
  reason: { kind: 'user', text: 'say "hi"' },
};

describe('Formatting', () => {
  it('should format text as path:line:col: message', () => {
    expect(formatDiagnostic(trailing)).toBe('src/app.ts:3:14: trailing whitespace');
  });

  it('should format one JSON object per diagnostic', () => {
    expect(formatDiagnosticJson(trailing)).toBe(
      '{"path":"src/app.ts","line":3,"column":14,"rule":"trailing-space","message":"trailing whitespace"}'
    );
  });

  it('should escape quotes in JSON output', () => {
    expect(JSON.parse(formatDiagnosticJson(userMatch))).toEqual({
      path: 'notes "draft".md',
      line: 1,
      column: 1,
      rule: 'user-pattern',
      message: 'say "hi"',
    });
  });

  it('should pick a formatter by name', () => {
    expect(formatterFor('text')).toBe(formatDiagnostic);
    expect(formatterFor('jsonl')).toBe(formatDiagnosticJson);
  });
});

describe('StreamSink', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'ttlint-sink-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('should write one text line per diagnostic', () => {
    const out = join(dir, 'out.txt');
    const fd = openSync(out, 'w');
    try {
      const sink = new StreamSink(fd);
      sink.report(trailing);
      sink.report(userMatch);
    } finally {
      closeSync(fd);
    }

    expect(readFileSync(out, 'utf8')).toBe('src/app.ts:3:14: trailing whitespace\nnotes "draft".md:1:1: say "hi"\n');
  });

  it('should write JSON lines', () => {
    const out = join(dir, 'out.jsonl');
    const fd = openSync(out, 'w');
    try {
      new StreamSink(fd, 'jsonl').report(trailing);
    } finally {
      closeSync(fd);
    }

    const lines = readFileSync(out, 'utf8').split('\n');
    expect(lines).toHaveLength(2);
    expect(lines[1]).toBe('');
    expect(JSON.parse(lines[0])).toMatchObject({ path: 'src/app.ts', rule: 'trailing-space' });
  });

  it('should wrap write failures', () => {
    const path = join(dir, 'readonly.txt');
    writeFileSync(path, '');
    const fd = openSync(path, 'r');
    try {
      const sink = new StreamSink(fd);
      const error = captureError(() => sink.report(trailing));

      expect(error).toBeInstanceOf(LintError);
      expect(error).toMatchObject({
        code: LintErrorCode.SINK_WRITE,
        message: 'Failed to write diagnostic for src/app.ts',
        details: { fd, path: 'src/app.ts' },
      });
    } finally {
      closeSync(fd);
    }
  });
});

describe('CollectingSink', () => {
  it('should keep diagnostics in order and clear them', () => {
    const sink = new CollectingSink();
    sink.report(trailing);
    sink.report(userMatch);

    expect(sink.diagnostics).toEqual([trailing, userMatch]);
    expect(sink.lines()).toEqual(['src/app.ts:3:14: trailing whitespace', 'notes "draft".md:1:1: say "hi"']);

    sink.clear();
    expect(sink.diagnostics).toEqual([]);
  });
});
