// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Server log commands.
 */

import { logger } from '../logger.js';
import { AppPaths } from '../paths.js';
import type { OutputSink } from '../output/sink.js';
import { tailLog } from '../logs/tail.js';
import { followLog, type FollowOptions } from '../logs/follow.js';

export interface LogsOptions {
  follow?: boolean;
  /** Number of trailing lines; 0 prints everything */
  tail?: number;
  /** Read the desktop app log instead of the server log */
  app?: boolean;
  /** Explicit log file, overriding `app` and `logDir` */
  path?: string;
  logDir?: string;
  pollIntervalMs?: number;
  /** Test hooks for the follow engine */
  followOptions?: Omit<FollowOptions, 'signal' | 'pollIntervalMs'>;
}

/**
 * The log file a `logs` invocation reads.
 */
export function selectLogFile(options: Pick<LogsOptions, 'app' | 'path' | 'logDir'>): string {
  if (options.path) return options.path;
  return options.app ? AppPaths.appLog(options.logDir) : AppPaths.serverLog(options.logDir);
}

/**
 * Print the tail of a log file, and with `follow` keep streaming appended
 * lines until the signal aborts.
 */
export async function logsHandler(options: LogsOptions, sink: OutputSink, signal?: AbortSignal): Promise<void> {
  const file = selectLogFile(options);
  const tail = options.tail ?? 0;
  logger.verbose(`Reading ${file}${tail > 0 ? ` (last ${tail} lines)` : ''}`);

  if (!options.follow) {
    tailLog(file, tail, sink);
    return;
  }

  await followLog(file, tail, sink, {
    ...options.followOptions,
    signal,
    pollIntervalMs: options.pollIntervalMs,
  });
}
