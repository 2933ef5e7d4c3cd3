// Copyright 2026 Layne Penney
// SPDX-License-Identifier: Apache-2.0

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { tailLog, READ_CHUNK_SIZE } from '../src/logs/tail.js';
import { BufferSink } from '../src/output/sink.js';
import { LogFileError } from '../src/errors.js';

describe('tailLog', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'lmctl-tail-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  function writeLog(content: string | Buffer): string {
    const file = path.join(dir, 'server.log');
    fs.writeFileSync(file, content);
    return file;
  }

  function tail(content: string, lastN: number): string {
    const sink = new BufferSink();
    tailLog(writeLog(content), lastN, sink);
    return sink.toString();
  }

  it('shows all lines when the tail count is zero', () => {
    expect(tail('log line 1\nlog line 2\nlog line 3\n', 0)).toBe('log line 1\nlog line 2\nlog line 3\n');
  });

  it('shows the last lines', () => {
    expect(tail('log line 1\nlog line 2\nlog line 3\nlog line 4\n', 2)).toBe('log line 3\nlog line 4\n');
    expect(tail('log line 1\nlog line 2\nlog line 3\n', 1)).toBe('log line 3\n');
  });

  it('shows the whole file when the tail is larger than the file', () => {
    expect(tail('line 1\nline 2\n', 10)).toBe('line 1\nline 2\n');
  });

  it('prints nothing for an empty file', () => {
    expect(tail('', 0)).toBe('');
  });

  it('holds back an unterminated final line', () => {
    expect(tail('done\nhalf-writ', 0)).toBe('done\n');
    expect(tail('done\nhalf-writ', 1)).toBe('done\n');
  });

  it('normalizes CRLF line endings', () => {
    expect(tail('a\r\nb\r\n', 0)).toBe('a\nb\n');
  });

  it('reports the offset and the unterminated fragment', () => {
    const sink = new BufferSink();
    const result = tailLog(writeLog('x\ny\npartial'), 1, sink);

    expect(result.lines).toBe(1);
    expect(result.offset).toBe(11);
    expect(result.window.splitter.pendingText()).toBe('partial');
  });

  it('tails files larger than one read', () => {
    const lines = Array.from({ length: 10_000 }, (_, i) => `line ${String(i).padStart(5, '0')}`);
    const content = lines.join('\n') + '\n';
    expect(Buffer.byteLength(content)).toBeGreaterThan(READ_CHUNK_SIZE);

    const sink = new BufferSink();
    const result = tailLog(writeLog(content), 3, sink);

    expect(sink.toString()).toBe('line 09997\nline 09998\nline 09999\n');
    expect(result.offset).toBe(Buffer.byteLength(content));
  });

  it('writes one line per sink call', () => {
    const sink = new BufferSink();
    tailLog(writeLog('a\nb\nc\n'), 0, sink);
    expect(sink.writeCount).toBe(3);
  });

  it('fails with not_found for a missing file', () => {
    const missing = path.join(dir, 'nope.log');
    const error = (() => {
      try {
        tailLog(missing, 0, new BufferSink());
      } catch (e) {
        return e;
      }
      return undefined;
    })();

    expect(error).toBeInstanceOf(LogFileError);
    expect(error instanceof LogFileError && error.code).toBe('not_found');
    expect(error instanceof Error && error.message).toBe(
      `failed to open log file ${missing}: no such file or directory`
    );
  });

  it('fails with read_failed when the path is a directory', () => {
    expect(() => tailLog(dir, 0, new BufferSink())).toThrow(`failed to read log file ${dir}`);
  });
});
