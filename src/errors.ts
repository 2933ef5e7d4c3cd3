// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Error types shared by the commands.
 * Each error carries a category and optional recovery suggestions
 * so the CLI can print something actionable.
 */

/**
 * Error categories for classification.
 */
export enum ErrorCategory {
  VALIDATION = 'validation',
  FILE_IO = 'file_io',
  NETWORK = 'network',
  SERVER = 'server',
  UNKNOWN = 'unknown',
}

/**
 * Base error with category and recovery suggestions.
 */
export class LmctlError extends Error {
  constructor(
    message: string,
    public category: ErrorCategory = ErrorCategory.UNKNOWN,
    public suggestions: string[] = [],
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'LmctlError';
  }

  /**
   * Format the error with its suggestions.
   */
  getFullMessage(): string {
    let output = this.message;

    if (this.suggestions.length > 0) {
      output += '\n\nSuggestions:\n';
      this.suggestions.forEach((suggestion, index) => {
        output += `  ${index + 1}. ${suggestion}\n`;
      });
    }

    return output.trimEnd();
  }
}

export type LogFileErrorCode = 'not_found' | 'read_failed';

/**
 * A log file could not be opened or read.
 */
export class LogFileError extends LmctlError {
  constructor(
    message: string,
    public readonly path: string,
    public readonly code: LogFileErrorCode,
    options?: { cause?: unknown }
  ) {
    super(
      message,
      ErrorCategory.FILE_IO,
      code === 'not_found'
        ? ['Check that the server has been started at least once', 'Pass the log file explicitly: lmctl logs <path>']
        : ['Check the file permissions'],
      options
    );
    this.name = 'LogFileError';
  }
}

/**
 * Writing to an output sink failed.
 */
export class SinkWriteError extends LmctlError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, ErrorCategory.FILE_IO, [], options);
    this.name = 'SinkWriteError';
  }
}

/**
 * The server answered with a non-success status or an error payload.
 */
export class ApiError extends LmctlError {
  constructor(
    message: string,
    public readonly status: number,
    options?: { cause?: unknown }
  ) {
    super(message, ErrorCategory.SERVER, [], options);
    this.name = 'ApiError';
  }
}

/**
 * The server could not be reached at all.
 */
export class ConnectionError extends LmctlError {
  constructor(
    public readonly host: string,
    options?: { cause?: unknown }
  ) {
    super(
      `could not connect to server at ${host}`,
      ErrorCategory.NETWORK,
      ['Make sure the server is running', 'Set the host with --host or OLLAMA_HOST'],
      options
    );
    this.name = 'ConnectionError';
  }
}

/**
 * A Modelfile could not be parsed.
 */
export class ModelfileError extends LmctlError {
  constructor(
    message: string,
    public readonly line?: number
  ) {
    super(line !== undefined ? `${message} (line ${line})` : message, ErrorCategory.VALIDATION);
    this.name = 'ModelfileError';
  }
}

/**
 * No Modelfile at the given or default location.
 */
export class ModelfileNotFoundError extends LmctlError {
  readonly code = 'ENOENT';

  constructor(
    public readonly path: string,
    options?: { cause?: unknown }
  ) {
    super(`no Modelfile found at ${path}`, ErrorCategory.FILE_IO, ['Pass the Modelfile location with --file'], options);
    this.name = 'ModelfileNotFoundError';
  }
}

/**
 * Extract a printable message from anything thrown.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Format an error for the terminal, with suggestions when available.
 */
export function formatError(error: unknown): string {
  if (error instanceof LmctlError) {
    return error.getFullMessage();
  }
  return errorMessage(error);
}
