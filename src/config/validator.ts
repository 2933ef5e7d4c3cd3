// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Configuration Validator
 */

import type { WorkspaceConfig } from './types.js';

/**
 * Validate configuration.
 * Returns an array of warning messages for invalid options.
 */
export function validateConfig(config: WorkspaceConfig): string[] {
  const warnings: string[] = [];

  if (config.host !== undefined && !config.host.trim()) {
    warnings.push('host must not be empty');
  }

  if (config.registryUrl !== undefined) {
    try {
      new URL(config.registryUrl);
    } catch {
      warnings.push(`registryUrl is not a valid URL: "${config.registryUrl}"`);
    }
  }

  if (config.pollIntervalMs !== undefined) {
    if (!Number.isFinite(config.pollIntervalMs) || config.pollIntervalMs <= 0) {
      warnings.push('pollIntervalMs must be a positive number');
    }
  }

  if (config.tail !== undefined) {
    if (!Number.isInteger(config.tail) || config.tail < 0) {
      warnings.push('tail must be a non-negative integer');
    }
  }

  return warnings;
}
