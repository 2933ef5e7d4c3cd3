// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Poll ticks for the follow engine.
 *
 * A tick fires when chokidar reports a change to the file or when the poll
 * interval elapses, whichever comes first. Aborting the signal wakes a
 * pending wait immediately.
 */

import { watch, type FSWatcher } from 'chokidar';
import { logger } from '../logger.js';
import { errorMessage } from '../errors.js';

export interface ChangeSource {
  /** Resolve on the next tick, change, or abort. Never rejects. */
  next(signal?: AbortSignal): Promise<void>;
  close(): Promise<void>;
}

export type ChangeSourceFactory = (path: string, intervalMs: number) => ChangeSource;

export class WatchChangeSource implements ChangeSource {
  private readonly watcher: FSWatcher;
  private changed = false;
  private wake: (() => void) | null = null;

  constructor(
    private readonly path: string,
    private readonly intervalMs: number
  ) {
    // Stat-based polling at the follow interval
    this.watcher = watch(path, {
      persistent: true,
      usePolling: true,
      interval: intervalMs,
      ignoreInitial: true,
    });

    const notify = (): void => {
      this.changed = true;
      this.wake?.();
    };
    this.watcher.on('change', notify);
    this.watcher.on('add', notify);
    this.watcher.on('unlink', notify);
    this.watcher.on('error', (error: unknown) => {
      logger.debug(`Watcher error for ${this.path}: ${errorMessage(error)}`);
    });
  }

  next(signal?: AbortSignal): Promise<void> {
    if (this.changed || signal?.aborted) {
      this.changed = false;
      return Promise.resolve();
    }

    return new Promise<void>((resolve) => {
      const finish = (): void => {
        clearTimeout(timer);
        signal?.removeEventListener('abort', finish);
        this.wake = null;
        this.changed = false;
        resolve();
      };
      const timer = setTimeout(finish, this.intervalMs);
      this.wake = finish;
      signal?.addEventListener('abort', finish, { once: true });
    });
  }

  async close(): Promise<void> {
    this.wake?.();
    await this.watcher.close();
  }
}

export const watchChangeSource: ChangeSourceFactory = (path, intervalMs) => new WatchChangeSource(path, intervalMs);
