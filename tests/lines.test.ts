// Copyright 2026 Layne Penney
// SPDX-License-Identifier: Apache-2.0

import { describe, it, expect } from 'vitest';
import { LineRing, LineSplitter, TailWindow } from '../src/logs/lines.js';

describe('LineSplitter', () => {
  it('returns complete lines and buffers the fragment', () => {
    const splitter = new LineSplitter();

    expect(splitter.push(Buffer.from('one\ntwo\nthr'))).toEqual(['one', 'two']);
    expect(splitter.pendingBytes).toBe(3);
    expect(splitter.pendingText()).toBe('thr');

    expect(splitter.push(Buffer.from('ee\n'))).toEqual(['three']);
    expect(splitter.pendingBytes).toBe(0);
  });

  it('strips a carriage return before the newline', () => {
    expect(new LineSplitter().push(Buffer.from('a\r\nb\r\n'))).toEqual(['a', 'b']);
  });

  it('keeps empty lines', () => {
    expect(new LineSplitter().push(Buffer.from('\n\nx\n'))).toEqual(['', '', 'x']);
  });

  it('joins a multi-byte character split across chunks', () => {
    const bytes = Buffer.from('café\n');
    const splitter = new LineSplitter();

    expect(splitter.push(bytes.subarray(0, 4))).toEqual([]);
    expect(splitter.push(bytes.subarray(4))).toEqual(['café']);
  });

  it('is not affected by reuse of the caller buffer', () => {
    const buffer = Buffer.from('abc');
    const splitter = new LineSplitter();
    splitter.push(buffer);
    buffer.write('xyz');

    expect(splitter.push(Buffer.from('\n'))).toEqual(['abc']);
  });

  it('drops the fragment on reset', () => {
    const splitter = new LineSplitter();
    splitter.push(Buffer.from('partial'));
    splitter.reset();

    expect(splitter.pendingBytes).toBe(0);
    expect(splitter.push(Buffer.from('new\n'))).toEqual(['new']);
  });
});

describe('LineRing', () => {
  it('keeps the most recent lines in order', () => {
    const ring = new LineRing(2);
    for (const line of ['a', 'b', 'c', 'd', 'e']) ring.push(line);

    expect(ring.size).toBe(2);
    expect(ring.toArray()).toEqual(['d', 'e']);
  });

  it('rejects a capacity below one', () => {
    expect(() => new LineRing(0)).toThrow(RangeError);
  });

  it('returns fewer lines than capacity when short', () => {
    const ring = new LineRing(10);
    ring.push('only');
    expect(ring.toArray()).toEqual(['only']);
  });
});

describe('TailWindow', () => {
  it('keeps the last N complete lines and the trailing fragment', () => {
    const emitted: string[] = [];
    const window = new TailWindow(2, (line) => emitted.push(line));
    window.feed(Buffer.from('1\n2\n3\n4'));

    expect(emitted).toEqual([]);
    expect(window.flush()).toBe(2);
    expect(emitted).toEqual(['2', '3']);
    expect(window.splitter.pendingText()).toBe('4');
  });

  it('streams every line as it is fed when N is zero', () => {
    const emitted: string[] = [];
    const window = new TailWindow(0, (line) => emitted.push(line));

    window.feed(Buffer.from('1\n2\n3'));
    expect(emitted).toEqual(['1', '2']);

    window.feed(Buffer.from('\n'));
    expect(emitted).toEqual(['1', '2', '3']);

    expect(window.flush()).toBe(3);
    expect(emitted).toEqual(['1', '2', '3']);
  });
});
