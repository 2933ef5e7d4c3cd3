// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Live log following.
 *
 * State machine:
 *   init    → emit the initial tail window, cursor = end of file
 *   polling → on each tick, read bytes past the cursor and emit completed lines
 *   done    → signal aborted (or an error); buffered fragment is discarded
 *
 * If the file shrinks below the cursor (truncation) or a different file now
 * sits at the path (rotation), the cursor resets to zero and the new content
 * is read from the start. A file that vanishes mid-rotation is waited for.
 */

import { logger } from '../logger.js';
import { writeTo, type OutputSink } from '../output/sink.js';
import { LineSplitter, TailWindow } from './lines.js';
import { nodeFileSystem, type FileStat, type LogFileSystem } from './file-system.js';
import { watchChangeSource, type ChangeSourceFactory } from './change-source.js';
import { READ_CHUNK_SIZE, isNotFound, openError, readError } from './tail.js';

export const DEFAULT_POLL_INTERVAL_MS = 250;

export type FollowState = 'init' | 'polling' | 'done';

export interface FollowOptions {
  signal?: AbortSignal;
  pollIntervalMs?: number;
  fileSystem?: LogFileSystem;
  changeSource?: ChangeSourceFactory;
}

/**
 * Read position and last observed file state.
 */
export interface TailCursor {
  offset: number;
  size: number;
  /** Identity (inode) of the file the offset refers to */
  fileId: number;
}

export class LogFollower {
  private state: FollowState = 'init';
  private cursor: TailCursor = { offset: 0, size: 0, fileId: 0 };
  private splitter = new LineSplitter();
  private readonly signal?: AbortSignal;
  private readonly pollIntervalMs: number;
  private readonly fs: LogFileSystem;
  private readonly changeSource: ChangeSourceFactory;

  constructor(
    private readonly path: string,
    private readonly lastN: number,
    private readonly sink: OutputSink,
    options: FollowOptions = {}
  ) {
    this.signal = options.signal;
    this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    this.fs = options.fileSystem ?? nodeFileSystem;
    this.changeSource = options.changeSource ?? watchChangeSource;
  }

  getState(): FollowState {
    return this.state;
  }

  getCursor(): Readonly<TailCursor> {
    return { ...this.cursor };
  }

  /** Bytes of an unterminated line waiting for its newline. */
  getPendingBytes(): number {
    return this.splitter.pendingBytes;
  }

  /**
   * Read [from, to) in chunks, handing each chunk to `onChunk`.
   * Returns the offset actually reached (less than `to` if the file shrank).
   * A missing file is rethrown as is; other failures become read errors.
   */
  private async readRange(from: number, to: number, onChunk: (chunk: Buffer) => void): Promise<number> {
    let offset = from;
    while (offset < to) {
      let chunk: Buffer;
      try {
        chunk = await this.fs.read(this.path, offset, Math.min(READ_CHUNK_SIZE, to - offset));
      } catch (error) {
        if (isNotFound(error)) throw error;
        throw readError(this.path, error);
      }
      if (chunk.length === 0) break;
      offset += chunk.length;
      onChunk(chunk);
    }
    return offset;
  }

  private emit(line: string): void {
    writeTo(this.sink, line + '\n');
  }

  /**
   * init → polling: emit the last `lastN` complete lines and place the
   * cursor at the end of what was read. Goes straight to done when the
   * signal is already aborted.
   */
  async start(): Promise<void> {
    if (this.state !== 'init') return;

    if (this.signal?.aborted) {
      this.state = 'done';
      return;
    }

    let stats: FileStat;
    try {
      stats = await this.fs.stat(this.path);
    } catch (error) {
      this.state = 'done';
      throw openError(this.path, error);
    }

    const window = new TailWindow(this.lastN, (line) => this.emit(line));
    let end: number;
    try {
      end = await this.readRange(0, stats.size, (chunk) => window.feed(chunk));
      window.flush();
    } catch (error) {
      this.state = 'done';
      throw isNotFound(error) ? openError(this.path, error) : error;
    }

    this.splitter = window.splitter;
    this.cursor = { offset: end, size: stats.size, fileId: stats.ino };
    this.state = 'polling';
    logger.verbose(`Following ${this.path} from byte ${end}`);
  }

  private restart(fileId: number): void {
    this.cursor.offset = 0;
    this.cursor.fileId = fileId;
    this.splitter.reset();
  }

  /**
   * One polling cycle. Returns the number of lines emitted.
   */
  async poll(): Promise<number> {
    if (this.state !== 'polling') return 0;

    let stats: FileStat;
    try {
      stats = await this.fs.stat(this.path);
    } catch (error) {
      if (isNotFound(error)) {
        // Mid-rotation: the old file is gone and the new one is not there yet
        logger.debug(`${this.path} is missing; waiting for it to reappear`);
        return 0;
      }
      throw readError(this.path, error);
    }

    if (stats.ino !== this.cursor.fileId) {
      logger.warn(`${this.path} was replaced; reading the new file from the start`);
      this.restart(stats.ino);
    } else if (stats.size < this.cursor.offset) {
      logger.warn(`${this.path} was truncated (${stats.size} < ${this.cursor.offset} bytes); reading from the start`);
      this.restart(stats.ino);
    }

    this.cursor.size = stats.size;
    if (stats.size === this.cursor.offset) {
      return 0;
    }

    const from = this.cursor.offset;
    let emitted = 0;
    try {
      await this.readRange(from, stats.size, (chunk) => {
        this.cursor.offset += chunk.length;
        for (const line of this.splitter.push(chunk)) {
          this.emit(line);
          emitted++;
        }
      });
    } catch (error) {
      if (!isNotFound(error)) throw error;
      // Rotated away between stat and read; the next poll sees the new file
      logger.debug(`${this.path} disappeared while reading; waiting for it to reappear`);
    }

    logger.cursor(this.path, from, this.cursor.offset, emitted);
    return emitted;
  }

  /**
   * Run until the signal aborts. Resolves normally on cancellation.
   */
  async run(): Promise<void> {
    await this.start();
    if (this.state !== 'polling') return;

    const source = this.changeSource(this.path, this.pollIntervalMs);
    try {
      while (!this.signal?.aborted) {
        await source.next(this.signal);
        if (this.signal?.aborted) break;
        await this.poll();
      }
    } finally {
      this.state = 'done';
      if (this.splitter.pendingBytes > 0) {
        logger.debug(`Discarding ${this.splitter.pendingBytes} bytes of unterminated output`);
      }
      await source.close();
    }
  }
}

/**
 * Tail a log file, then stream appended lines to the sink until
 * `options.signal` aborts.
 */
export async function followLog(
  path: string,
  lastN: number,
  sink: OutputSink,
  options: FollowOptions = {}
): Promise<void> {
  await new LogFollower(path, lastN, sink, options).run();
}
