// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Centralized path management.
 *
 * Each path getter computes the path at call time, so environment
 * overrides set by tests (or by the user) take effect immediately.
 */

import { join } from 'node:path';
import { homedir } from 'node:os';

/**
 * Get the base lmctl directory.
 * Supports override via LMCTL_HOME.
 */
export function getAppHome(): string {
  if (process.env.LMCTL_HOME) {
    return process.env.LMCTL_HOME;
  }
  return join(homedir(), '.lmctl');
}

/**
 * Directory the model server writes its logs to.
 * Supports override via LMCTL_LOG_DIR.
 */
export function getServerLogDir(): string {
  if (process.env.LMCTL_LOG_DIR) {
    return process.env.LMCTL_LOG_DIR;
  }
  return join(homedir(), '.ollama', 'logs');
}

export const AppPaths = {
  /**
   * Base directory (~/.lmctl)
   */
  home: (): string => getAppHome(),

  /**
   * Global config file
   */
  globalConfig: (): string => join(getAppHome(), 'config.json'),

  // ============================================
  // Server logs
  // ============================================

  logDir: (): string => getServerLogDir(),

  /**
   * Model server log
   */
  serverLog: (logDir: string = getServerLogDir()): string => join(logDir, 'server.log'),

  /**
   * Desktop app log
   */
  appLog: (logDir: string = getServerLogDir()): string => join(logDir, 'app.log'),
} as const;
