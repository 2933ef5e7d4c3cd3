// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * One-shot tail of a log file.
 */

import { closeSync, openSync, readSync } from 'node:fs';
import { LogFileError, errorMessage } from '../errors.js';
import { writeTo, type OutputSink } from '../output/sink.js';
import { TailWindow } from './lines.js';

/** Bytes read per call while scanning a log file. */
export const READ_CHUNK_SIZE = 64 * 1024;

export interface TailResult {
  /** Lines written to the sink */
  lines: number;
  /** Byte offset where reading stopped (end of file at the time) */
  offset: number;
  /** Window state; its splitter holds the unterminated final fragment */
  window: TailWindow;
}

export function isNotFound(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}

export function openError(path: string, error: unknown): LogFileError {
  if (isNotFound(error)) {
    return new LogFileError(`failed to open log file ${path}: no such file or directory`, path, 'not_found', {
      cause: error,
    });
  }
  return new LogFileError(`failed to open log file ${path}: ${errorMessage(error)}`, path, 'read_failed', {
    cause: error,
  });
}

export function readError(path: string, error: unknown): LogFileError {
  return new LogFileError(`failed to read log file ${path}: ${errorMessage(error)}`, path, 'read_failed', {
    cause: error,
  });
}

/**
 * Write the last `lastN` complete lines of a file to the sink
 * (`lastN <= 0` writes all of them, streaming as the file is read).
 * A final line without a terminator is held back. The file is closed
 * before this returns.
 */
export function tailLog(path: string, lastN: number, sink: OutputSink): TailResult {
  let fd: number;
  try {
    fd = openSync(path, 'r');
  } catch (error) {
    throw openError(path, error);
  }

  const window = new TailWindow(lastN, (line) => writeTo(sink, line + '\n'));
  let offset = 0;
  try {
    const chunk = Buffer.alloc(READ_CHUNK_SIZE);
    for (;;) {
      let bytesRead: number;
      try {
        bytesRead = readSync(fd, chunk, 0, chunk.length, offset);
      } catch (error) {
        throw readError(path, error);
      }
      if (bytesRead === 0) break;
      offset += bytesRead;
      window.feed(chunk.subarray(0, bytesRead));
    }
  } finally {
    closeSync(fd);
  }

  const lines = window.flush();
  return { lines, offset, window };
}
