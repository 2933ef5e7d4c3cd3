// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Column-aligned plain-text tables.
 *
 * Every cell is padded to its column width and followed by the column gap,
 * including the last cell of a row. Trailing spaces are part of the output.
 * Widths are terminal columns: wide East Asian characters and emoji count as two.
 */

import stringWidth from 'string-width';

export const COLUMN_GAP = '    ';

export interface TableOptions {
  /** Separator appended after every cell (default: four spaces) */
  gap?: string;
  /** First row is a header; its last cell ends with a single space instead of the gap */
  header?: boolean;
}

const HEADER_END = ' ';

/**
 * Display width of a cell in terminal columns.
 */
export function cellWidth(text: string): number {
  return stringWidth(text);
}

function padCell(text: string, width: number): string {
  return text + ' '.repeat(Math.max(0, width - cellWidth(text)));
}

/**
 * Format rows into aligned lines (without line terminators).
 * Short rows are treated as if padded with empty cells.
 */
export function formatTable(rows: readonly (readonly string[])[], options: TableOptions = {}): string[] {
  const gap = options.gap ?? COLUMN_GAP;
  const columnCount = rows.reduce((max, row) => Math.max(max, row.length), 0);

  const widths: number[] = new Array<number>(columnCount).fill(0);
  for (const row of rows) {
    row.forEach((cell, index) => {
      widths[index] = Math.max(widths[index], cellWidth(cell));
    });
  }

  return rows.map((row, rowIndex) => {
    const isHeader = options.header === true && rowIndex === 0;
    let line = '';
    for (let index = 0; index < columnCount; index++) {
      const separator = isHeader && index === columnCount - 1 ? HEADER_END : gap;
      line += padCell(row[index] ?? '', widths[index]) + separator;
    }
    return line;
  });
}
