// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Output sinks.
 * Report and log output is written through a sink so commands can target
 * stdout in the CLI and an in-memory buffer in tests.
 */

import { SinkWriteError, errorMessage } from '../errors.js';

/**
 * Destination for text output. `write` throws when the destination fails.
 */
export interface OutputSink {
  write(text: string): void;
}

/**
 * Sink over a Node writable stream such as process.stdout.
 * Stream errors arrive asynchronously, so they are surfaced on the next write.
 */
export class StreamSink implements OutputSink {
  private failure: Error | null = null;

  constructor(private readonly stream: NodeJS.WritableStream) {
    stream.on('error', (error: Error) => {
      this.failure = error;
    });
  }

  write(text: string): void {
    if (this.failure) {
      throw this.failure;
    }
    this.stream.write(text);
  }
}

/**
 * Sink that collects everything in memory.
 */
export class BufferSink implements OutputSink {
  private chunks: string[] = [];

  write(text: string): void {
    this.chunks.push(text);
  }

  toString(): string {
    return this.chunks.join('');
  }

  /** Number of write calls received. */
  get writeCount(): number {
    return this.chunks.length;
  }

  clear(): void {
    this.chunks = [];
  }
}

/**
 * Write to a sink, wrapping any failure in a SinkWriteError.
 */
export function writeTo(sink: OutputSink, text: string): void {
  try {
    sink.write(text);
  } catch (error) {
    if (error instanceof SinkWriteError) {
      throw error;
    }
    throw new SinkWriteError(`failed to write output: ${errorMessage(error)}`, { cause: error });
  }
}
