// Copyright 2026 Layne Penney
// SPDX-License-Identifier: Apache-2.0

import { describe, it, expect } from 'vitest';
import { COLUMN_GAP, cellWidth, formatTable } from '../src/show/table.js';

describe('formatTable', () => {
  it('pads every cell, including the last, and appends the gap', () => {
    const lines = formatTable([
      ['a', 'bb'],
      ['ccc', 'd'],
    ]);
    expect(lines).toEqual(['a      bb    ', 'ccc    d     ']);
  });

  it('uses a four-space gap by default', () => {
    expect(COLUMN_GAP).toBe('    ');
    expect(formatTable([['x']])).toEqual(['x    ']);
  });

  it('produces an indent from a leading empty column', () => {
    expect(formatTable([['', 'stop', 'up']])).toEqual(['    stop    up    ']);
  });

  it('treats short rows as padded with empty cells', () => {
    const lines = formatTable([['name', 'value'], ['only']]);
    expect(lines).toEqual(['name    value    ', 'only             ']);
  });

  it('honors a custom gap', () => {
    expect(formatTable([['a', 'b']], { gap: '|' })).toEqual(['a|b|']);
  });

  it('returns no lines for no rows', () => {
    expect(formatTable([])).toEqual([]);
  });

  it('measures width in terminal columns', () => {
    expect(cellWidth('héllo')).toBe(5);
    expect(cellWidth('🙂x')).toBe(3);
    expect(cellWidth('模型')).toBe(4);
  });

  it('aligns wide characters by display width', () => {
    expect(formatTable([['模型', 'a'], ['abc', 'b']])).toEqual(['模型    a    ', 'abc     b    ']);
  });

  it('ends a header row with a single space', () => {
    const lines = formatTable(
      [
        ['NAME', 'SIZE'],
        ['model1', '1.0 KB'],
      ],
      { header: true }
    );
    expect(lines).toEqual(['NAME      SIZE   ', 'model1    1.0 KB    ']);
  });

  it('ends a lone header row with a single space', () => {
    expect(formatTable([['NAME', 'ID']], { header: true })).toEqual(['NAME    ID ']);
  });
});
