// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Logger
 *
 * Level-aware logging utilities for diagnostic output.
 * Provides graduated verbosity: NORMAL → VERBOSE → DEBUG → TRACE
 *
 * Everything goes to stderr: stdout carries report and log output
 * that users pipe into other tools.
 */

import chalk from 'chalk';

/**
 * Log levels for graduated verbosity.
 */
export enum LogLevel {
  /** Normal output - only essential information */
  NORMAL = 0,
  /** Verbose - resolved config, file positions */
  VERBOSE = 1,
  /** Debug - API requests and responses */
  DEBUG = 2,
  /** Trace - full request/response payloads */
  TRACE = 3,
}

/**
 * Parse log level from CLI options.
 */
export function parseLogLevel(options: {
  verbose?: boolean;
  debug?: boolean;
  trace?: boolean;
}): LogLevel {
  if (options.trace) return LogLevel.TRACE;
  if (options.debug) return LogLevel.DEBUG;
  if (options.verbose) return LogLevel.VERBOSE;
  return LogLevel.NORMAL;
}

/**
 * Centralized logger with level-aware output.
 */
class Logger {
  private level: LogLevel = LogLevel.NORMAL;

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  /**
   * Check if a specific level is enabled.
   */
  isLevelEnabled(level: LogLevel): boolean {
    return this.level >= level;
  }

  // ============================================
  // Level-aware logging methods
  // ============================================

  /**
   * Log at VERBOSE level (shows at VERBOSE, DEBUG, TRACE).
   */
  verbose(message: string): void {
    if (this.level >= LogLevel.VERBOSE) {
      console.error(chalk.dim(message));
    }
  }

  /**
   * Log at DEBUG level (shows at DEBUG, TRACE).
   */
  debug(message: string): void {
    if (this.level >= LogLevel.DEBUG) {
      console.error(chalk.dim(`[Debug] ${message}`));
    }
  }

  /**
   * Log at TRACE level (shows only at TRACE).
   */
  trace(message: string): void {
    if (this.level >= LogLevel.TRACE) {
      console.error(chalk.gray(`[Trace] ${message}`));
    }
  }

  // ============================================
  // Formatted output helpers
  // ============================================

  /**
   * Log an outgoing API request at DEBUG level, with the body at TRACE.
   */
  apiRequest(method: string, url: string, body?: unknown): void {
    if (this.level >= LogLevel.DEBUG) {
      console.error(chalk.dim(`[API] ${method} ${url}`));
    }
    if (body !== undefined && this.level >= LogLevel.TRACE) {
      const payload = JSON.stringify(body);
      const truncated = payload.length > 300 ? payload.slice(0, 300) + '...' : payload;
      console.error(chalk.gray(`  body: ${this.sanitize(truncated)}`));
    }
  }

  /**
   * Log an API response at DEBUG level.
   */
  apiResponse(status: number, duration: number): void {
    if (this.level >= LogLevel.DEBUG) {
      console.error(chalk.dim(`[API] Response: ${status}, ${duration.toFixed(2)}s`));
    }
  }

  /**
   * Log follow-engine cursor movement at TRACE level.
   */
  cursor(path: string, from: number, to: number, lines: number): void {
    if (this.level >= LogLevel.TRACE) {
      console.error(chalk.gray(`[Follow] ${path}: ${from} → ${to} (${lines} lines)`));
    }
  }

  /**
   * Sanitize a string for safe terminal output.
   */
  private sanitize(str: string): string {
    return str
      .replace(/[\x00-\x08\x0B\x0C\x0E-\x1F\x7F]/g, '') // Remove control chars except \t, \n, \r
      .replace(/\r?\n/g, '\\n')
      .replace(/\t/g, '\\t');
  }

  /**
   * Log an error with optional stack trace at DEBUG level.
   */
  error(message: string, error?: Error): void {
    console.error(chalk.red(`Error: ${message}`));
    if (error && this.level >= LogLevel.DEBUG) {
      console.error(chalk.dim(error.stack || 'No stack trace available'));
    }
  }

  /**
   * Log a warning.
   */
  warn(message: string): void {
    console.warn(chalk.yellow(`Warning: ${message}`));
  }

  /**
   * Log an info message.
   */
  info(message: string): void {
    console.error(chalk.blue(`Info: ${message}`));
  }
}

/**
 * Singleton logger instance for global use.
 */
export const logger = new Logger();
