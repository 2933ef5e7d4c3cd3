// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Configuration Loader
 *
 * Loads configuration files from the global directory and the workspace.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { AppPaths } from '../paths.js';
import { logger } from '../logger.js';
import { errorMessage } from '../errors.js';
import type { WorkspaceConfig } from './types.js';

/** Config file names to search for in the workspace */
export const CONFIG_FILES = ['.lmctl.json'];

/** Global config file name */
export const GLOBAL_CONFIG_FILE = 'config.json';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Keep only the known fields that carry the expected type.
 * Mistyped fields are reported and dropped.
 */
export function parseConfig(value: unknown, source: string): WorkspaceConfig {
  if (!isRecord(value)) {
    logger.warn(`Ignoring ${source}: expected a JSON object`);
    return {};
  }

  const config: WorkspaceConfig = {};
  const dropped: string[] = [];

  for (const key of ['host', 'logDir', 'registryUrl'] as const) {
    const field = value[key];
    if (typeof field === 'string') config[key] = field;
    else if (field !== undefined) dropped.push(key);
  }

  for (const key of ['pollIntervalMs', 'tail'] as const) {
    const field = value[key];
    if (typeof field === 'number') config[key] = field;
    else if (field !== undefined) dropped.push(key);
  }

  if (dropped.length > 0) {
    logger.warn(`Ignoring mistyped fields in ${source}: ${dropped.join(', ')}`);
  }
  return config;
}

function readConfigFile(configPath: string): WorkspaceConfig | null {
  if (!fs.existsSync(configPath)) {
    return null;
  }
  try {
    const content = fs.readFileSync(configPath, 'utf-8');
    return parseConfig(JSON.parse(content), configPath);
  } catch (error) {
    logger.warn(`Failed to load config from ${configPath}: ${errorMessage(error)}`);
    return null;
  }
}

/**
 * Load the global config from ~/.lmctl/config.json.
 * @param overrideDir Directory to read config.json from instead of the app home (for tests)
 */
export function loadGlobalConfig(overrideDir?: string): { config: WorkspaceConfig | null; configPath: string } {
  const configPath = overrideDir ? path.join(overrideDir, GLOBAL_CONFIG_FILE) : AppPaths.globalConfig();
  const config = readConfigFile(configPath);
  if (config) {
    logger.debug(`Loaded global config from ${configPath}`);
  }
  return { config, configPath };
}

/**
 * Find the workspace config file in the given directory.
 */
export function findWorkspaceConfig(cwd: string = process.cwd()): string | null {
  for (const filename of CONFIG_FILES) {
    const configPath = path.join(cwd, filename);
    if (fs.existsSync(configPath)) {
      return configPath;
    }
  }
  return null;
}

/**
 * Load the workspace config from the given directory.
 */
export function loadWorkspaceConfig(cwd: string = process.cwd()): { config: WorkspaceConfig | null; configPath: string | null } {
  const configPath = findWorkspaceConfig(cwd);
  if (!configPath) {
    return { config: null, configPath: null };
  }
  const config = readConfigFile(configPath);
  if (config) {
    logger.debug(`Loaded workspace config from ${configPath}`);
  }
  return { config, configPath };
}
