// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Spinner Manager
 *
 * Centralized spinner management using ora for progress feedback during
 * create and push. Spinners render on stderr.
 */

import ora, { type Ora } from 'ora';
import chalk from 'chalk';
import { logger } from './logger.js';
import { errorMessage } from './errors.js';
import { formatBytes } from './show/format.js';
import type { ProgressResponse } from './api/types.js';

/**
 * Manages a single spinner instance with TTY detection and state management.
 */
class SpinnerManager {
  private spinner: Ora | null = null;
  private enabled: boolean = true;

  constructor() {
    // Disable spinners when stderr is not a terminal
    this.enabled = process.stderr.isTTY ?? false;
  }

  /**
   * Enable or disable spinners globally.
   */
  setEnabled(enabled: boolean): void {
    this.enabled = enabled;
    if (!enabled && this.spinner) {
      this.stop();
    }
  }

  isEnabled(): boolean {
    return this.enabled;
  }

  /**
   * Start a new spinner with the given text.
   * If a spinner is already running, it will be stopped first.
   */
  start(text: string): void {
    if (!this.isEnabled()) return;

    try {
      if (this.spinner) {
        this.spinner.stop();
      }

      this.spinner = ora({
        text,
        color: 'cyan',
        spinner: 'dots',
        stream: process.stderr,
        discardStdin: false,
      }).start();
    } catch (error) {
      logger.debug(`Spinner unavailable: ${errorMessage(error)}`);
      this.spinner = null;
    }
  }

  /**
   * Update the spinner text, starting one if none is running.
   */
  update(text: string): void {
    if (!this.isEnabled()) return;
    if (this.spinner) {
      this.spinner.text = text;
    } else {
      this.start(text);
    }
  }

  /**
   * Stop the spinner with a success message.
   */
  succeed(text?: string): void {
    if (this.spinner) {
      this.spinner.succeed(text);
      this.spinner = null;
    }
  }

  /**
   * Stop the spinner with a failure message.
   */
  fail(text?: string): void {
    if (this.spinner) {
      this.spinner.fail(text);
      this.spinner = null;
    }
  }

  /**
   * Stop the spinner without any status symbol.
   */
  stop(): void {
    if (this.spinner) {
      this.spinner.stop();
      this.spinner = null;
    }
  }

  // ============================================
  // Convenience methods for common operations
  // ============================================

  /**
   * Show one line of a streamed create/push response.
   */
  progress(update: ProgressResponse): void {
    const status = update.status ?? (update.digest ? `pushing ${update.digest.slice(0, 19)}` : 'working');
    let text = chalk.cyan(status);
    if (update.total !== undefined && update.total > 0 && update.completed !== undefined) {
      const percent = Math.floor((update.completed / update.total) * 100);
      text += chalk.dim(` ${percent}% (${formatBytes(update.completed)}/${formatBytes(update.total)})`);
    }
    this.update(text);
  }
}

/**
 * Singleton spinner instance for global use.
 */
export const spinner = new SpinnerManager();
