// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * File access used by the follow engine. Swappable so the polling state
 * machine can be driven against an in-memory file.
 */

import { open, stat } from 'node:fs/promises';

export interface FileStat {
  size: number;
  /** Inode number; changes when the path is rotated to a new file */
  ino: number;
}

export interface LogFileSystem {
  stat(path: string): Promise<FileStat>;
  /** Read up to `length` bytes at `position`; a short result means end of file. */
  read(path: string, position: number, length: number): Promise<Buffer>;
}

export const nodeFileSystem: LogFileSystem = {
  async stat(path: string): Promise<FileStat> {
    const stats = await stat(path);
    return { size: stats.size, ino: stats.ino };
  },

  async read(path: string, position: number, length: number): Promise<Buffer> {
    const handle = await open(path, 'r');
    try {
      const buffer = Buffer.alloc(length);
      const { bytesRead } = await handle.read(buffer, 0, length, position);
      return buffer.subarray(0, bytesRead);
    } finally {
      await handle.close();
    }
  },
};
