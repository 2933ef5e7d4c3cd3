// Copyright 2026 Layne Penney
// SPDX-License-Identifier: Apache-2.0

/**
 * lmctl version.
 * Keep this in sync with package.json version.
 *
 * Versioning convention:
 * - MAJOR: Breaking changes to CLI interface or configuration
 * - MINOR: New commands, non-breaking output changes
 * - PATCH: Bug fixes, minor improvements
 */
export const VERSION = '0.3.0';
