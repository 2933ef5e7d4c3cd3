// Copyright 2026 Layne Penney
// SPDX-License-Identifier: Apache-2.0

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { logsHandler, selectLogFile } from '../src/commands/logs-commands.js';
import type { ChangeSourceFactory } from '../src/logs/change-source.js';
import { BufferSink } from '../src/output/sink.js';
import { LogFileError } from '../src/errors.js';

describe('selectLogFile', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('uses the server log by default', () => {
    expect(selectLogFile({ logDir: '/logs' })).toBe(path.join('/logs', 'server.log'));
  });

  it('uses the app log with app', () => {
    expect(selectLogFile({ app: true, logDir: '/logs' })).toBe(path.join('/logs', 'app.log'));
  });

  it('prefers an explicit path', () => {
    expect(selectLogFile({ app: true, path: '/tmp/other.log', logDir: '/logs' })).toBe('/tmp/other.log');
  });

  it('falls back to the default log directory', () => {
    vi.stubEnv('LMCTL_LOG_DIR', '/env/logs');
    expect(selectLogFile({})).toBe(path.join('/env/logs', 'server.log'));
  });
});

describe('logsHandler', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'lmctl-logs-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('prints the tail of the server log', async () => {
    fs.writeFileSync(path.join(dir, 'server.log'), 'a\nb\nc\n');
    const sink = new BufferSink();

    await logsHandler({ tail: 2, logDir: dir }, sink);

    expect(sink.toString()).toBe('b\nc\n');
  });

  it('prints the app log', async () => {
    fs.writeFileSync(path.join(dir, 'server.log'), 'server\n');
    fs.writeFileSync(path.join(dir, 'app.log'), 'app\n');
    const sink = new BufferSink();

    await logsHandler({ app: true, logDir: dir }, sink);

    expect(sink.toString()).toBe('app\n');
  });

  it('fails for a missing log', async () => {
    await expect(logsHandler({ logDir: dir }, new BufferSink())).rejects.toThrow(LogFileError);
    await expect(logsHandler({ logDir: dir }, new BufferSink())).rejects.toThrow('failed to open log file');
  });

  it('follows until the signal aborts', async () => {
    const file = path.join(dir, 'server.log');
    fs.writeFileSync(file, 'first\n');
    const sink = new BufferSink();
    const controller = new AbortController();
    let ticks = 0;
    const changeSource: ChangeSourceFactory = () => ({
      async next(): Promise<void> {
        ticks++;
        if (ticks === 1) fs.appendFileSync(file, 'second\n');
        else controller.abort();
      },
      async close(): Promise<void> {},
    });

    await logsHandler({ follow: true, logDir: dir, followOptions: { changeSource } }, sink, controller.signal);

    expect(sink.toString()).toBe('first\nsecond\n');
    expect(ticks).toBe(2);
  });
});
