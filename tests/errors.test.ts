// Copyright 2026 Layne Penney
// SPDX-License-Identifier: Apache-2.0

import { describe, it, expect } from 'vitest';
import {
  ApiError,
  ConnectionError,
  ErrorCategory,
  LmctlError,
  LogFileError,
  ModelfileError,
  ModelfileNotFoundError,
  errorMessage,
  formatError,
} from '../src/errors.js';

describe('LmctlError', () => {
  it('formats suggestions as a numbered list', () => {
    const error = new LmctlError('something failed', ErrorCategory.UNKNOWN, ['Try again', 'Check the logs']);

    expect(error.getFullMessage()).toBe('something failed\n\nSuggestions:\n  1. Try again\n  2. Check the logs');
  });

  it('returns the bare message without suggestions', () => {
    expect(new LmctlError('plain').getFullMessage()).toBe('plain');
  });

  it('keeps the cause', () => {
    const cause = new Error('root');
    expect(new LmctlError('outer', ErrorCategory.UNKNOWN, [], { cause }).cause).toBe(cause);
  });
});

describe('error subclasses', () => {
  it('categorizes log file errors by code', () => {
    const missing = new LogFileError('failed to open log file /x: no such file or directory', '/x', 'not_found');
    expect(missing.category).toBe(ErrorCategory.FILE_IO);
    expect(missing.suggestions).toContain('Pass the log file explicitly: lmctl logs <path>');
    expect(missing.name).toBe('LogFileError');
  });

  it('carries the HTTP status on ApiError', () => {
    const error = new ApiError('not found', 404);
    expect(error.status).toBe(404);
    expect(error.category).toBe(ErrorCategory.SERVER);
  });

  it('names the host in ConnectionError', () => {
    expect(new ConnectionError('http://127.0.0.1:11434').message).toBe('could not connect to server at http://127.0.0.1:11434');
  });

  it('appends the line number to ModelfileError', () => {
    expect(new ModelfileError('bad', 4).message).toBe('bad (line 4)');
    expect(new ModelfileError('bad').message).toBe('bad');
  });

  it('exposes ENOENT on ModelfileNotFoundError', () => {
    const error = new ModelfileNotFoundError('/work/Modelfile');
    expect(error.code).toBe('ENOENT');
    expect(error.message).toBe('no Modelfile found at /work/Modelfile');
  });
});

describe('formatError', () => {
  it('includes suggestions for LmctlError', () => {
    expect(formatError(new ConnectionError('http://h:1'))).toBe(
      'could not connect to server at http://h:1\n\nSuggestions:\n' +
        '  1. Make sure the server is running\n' +
        '  2. Set the host with --host or OLLAMA_HOST'
    );
  });

  it('uses the message of other errors', () => {
    expect(formatError(new Error('boom'))).toBe('boom');
    expect(errorMessage('text')).toBe('text');
  });
});
