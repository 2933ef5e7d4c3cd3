// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Configuration Types
 *
 * Type definitions for file and resolved configuration.
 */

/**
 * Configuration as written in ~/.lmctl/config.json or .lmctl.json.
 * Every field is optional; unknown fields are ignored.
 */
export interface WorkspaceConfig {
  /** Server address, e.g. "localhost:11434" or "https://models.example.com" */
  host?: string;

  /** Directory containing server.log and app.log */
  logDir?: string;

  /** Poll interval for `logs --follow`, in milliseconds */
  pollIntervalMs?: number;

  /** Base URL printed after a successful push */
  registryUrl?: string;

  /** Default number of lines for `logs` (0 = whole file) */
  tail?: number;
}

/**
 * Fully resolved configuration with defaults applied.
 */
export interface ResolvedConfig {
  host: string;
  logDir: string;
  pollIntervalMs: number;
  registryUrl: string;
  tail: number;
}
