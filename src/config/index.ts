// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Configuration module.
 */

import { logger } from '../logger.js';
import type { ResolvedConfig } from './types.js';
import { loadGlobalConfig, loadWorkspaceConfig } from './loader.js';
import { mergeConfig, type CLIOptions } from './merger.js';
import { validateConfig } from './validator.js';

export type { WorkspaceConfig, ResolvedConfig } from './types.js';
export { CONFIG_FILES, GLOBAL_CONFIG_FILE, parseConfig, loadGlobalConfig, findWorkspaceConfig, loadWorkspaceConfig } from './loader.js';
export { validateConfig } from './validator.js';
export { DEFAULT_REGISTRY_URL, getDefaultConfig, mergeConfig } from './merger.js';
export type { CLIOptions, EnvOverrides } from './merger.js';
export { DEFAULT_HOST, DEFAULT_PORT, normalizeHost } from './utils.js';

/**
 * Load, validate and merge every configuration layer.
 */
export function resolveConfig(cliOptions: CLIOptions = {}, cwd: string = process.cwd()): ResolvedConfig {
  const { config: globalConfig, configPath: globalPath } = loadGlobalConfig();
  const { config: workspaceConfig, configPath: workspacePath } = loadWorkspaceConfig(cwd);

  for (const [config, source] of [
    [globalConfig, globalPath],
    [workspaceConfig, workspacePath],
  ] as const) {
    if (!config) continue;
    for (const warning of validateConfig(config)) {
      logger.warn(`${source}: ${warning}`);
    }
  }

  return mergeConfig(globalConfig, workspaceConfig, cliOptions, {
    OLLAMA_HOST: process.env.OLLAMA_HOST,
    LMCTL_LOG_DIR: process.env.LMCTL_LOG_DIR,
  });
}
