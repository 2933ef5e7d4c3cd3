// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Configuration Merger
 *
 * Priority: CLI options > environment > workspace > global > defaults
 */

import { getServerLogDir } from '../paths.js';
import { DEFAULT_POLL_INTERVAL_MS } from '../logs/follow.js';
import type { ResolvedConfig, WorkspaceConfig } from './types.js';
import { normalizeHost } from './utils.js';

export const DEFAULT_REGISTRY_URL = 'https://ollama.com';

/**
 * Default configuration values. `logDir` is read at call time so
 * LMCTL_LOG_DIR set after import still applies.
 */
export function getDefaultConfig(): ResolvedConfig {
  return {
    host: normalizeHost(undefined),
    logDir: getServerLogDir(),
    pollIntervalMs: DEFAULT_POLL_INTERVAL_MS,
    registryUrl: DEFAULT_REGISTRY_URL,
    tail: 0,
  };
}

/**
 * CLI options that can override config.
 */
export interface CLIOptions {
  host?: string;
  logDir?: string;
}

/**
 * Environment variables that can override config.
 */
export interface EnvOverrides {
  OLLAMA_HOST?: string;
  LMCTL_LOG_DIR?: string;
}

function applyConfig(target: ResolvedConfig, config: WorkspaceConfig): void {
  if (config.host !== undefined && config.host.trim()) target.host = config.host;
  if (config.logDir !== undefined && config.logDir) target.logDir = config.logDir;
  if (config.pollIntervalMs !== undefined && config.pollIntervalMs > 0) target.pollIntervalMs = config.pollIntervalMs;
  if (config.registryUrl !== undefined && config.registryUrl) target.registryUrl = config.registryUrl;
  if (config.tail !== undefined && Number.isInteger(config.tail) && config.tail >= 0) target.tail = config.tail;
}

/**
 * Merge all configuration layers. The host is normalized last.
 */
export function mergeConfig(
  globalConfig: WorkspaceConfig | null,
  workspaceConfig: WorkspaceConfig | null,
  cliOptions: CLIOptions = {},
  env: EnvOverrides = {}
): ResolvedConfig {
  const config = getDefaultConfig();

  if (globalConfig) applyConfig(config, globalConfig);
  if (workspaceConfig) applyConfig(config, workspaceConfig);

  applyConfig(config, { host: env.OLLAMA_HOST, logDir: env.LMCTL_LOG_DIR });
  applyConfig(config, { host: cliOptions.host, logDir: cliOptions.logDir });

  config.host = normalizeHost(config.host);
  return config;
}
