// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Byte-level line splitting for log files.
 *
 * Lines are split on raw `\n` bytes before decoding, so a multi-byte
 * UTF-8 character that straddles two reads is never corrupted.
 */

const NEWLINE = 0x0a;
const CARRIAGE_RETURN = 0x0d;

function decodeLine(bytes: Buffer): string {
  const end = bytes.length > 0 && bytes[bytes.length - 1] === CARRIAGE_RETURN ? bytes.length - 1 : bytes.length;
  return bytes.toString('utf8', 0, end);
}

/**
 * Accumulates chunks and yields complete lines. An unterminated tail
 * stays buffered until a later chunk completes it.
 */
export class LineSplitter {
  private pending: Buffer = Buffer.alloc(0);

  /**
   * Add a chunk; returns the lines it completed, without terminators.
   */
  push(chunk: Buffer): string[] {
    const data = this.pending.length > 0 ? Buffer.concat([this.pending, chunk]) : chunk;
    const lines: string[] = [];

    let start = 0;
    let newline = data.indexOf(NEWLINE, start);
    while (newline !== -1) {
      lines.push(decodeLine(data.subarray(start, newline)));
      start = newline + 1;
      newline = data.indexOf(NEWLINE, start);
    }

    // Copy: the caller may reuse its read buffer
    this.pending = Buffer.from(data.subarray(start));
    return lines;
  }

  /** Bytes of the buffered unterminated fragment. */
  get pendingBytes(): number {
    return this.pending.length;
  }

  /** The buffered fragment, decoded. */
  pendingText(): string {
    return this.pending.toString('utf8');
  }

  reset(): void {
    this.pending = Buffer.alloc(0);
  }
}

/**
 * Keeps the most recent `capacity` lines.
 */
export class LineRing {
  private buffer: string[] = [];
  private start = 0;

  constructor(private readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`line ring capacity must be a positive integer, got ${capacity}`);
    }
  }

  push(line: string): void {
    if (this.buffer.length < this.capacity) {
      this.buffer.push(line);
      return;
    }
    this.buffer[this.start] = line;
    this.start = (this.start + 1) % this.capacity;
  }

  get size(): number {
    return this.buffer.length;
  }

  /** Lines in file order, oldest first. */
  toArray(): string[] {
    return [...this.buffer.slice(this.start), ...this.buffer.slice(0, this.start)];
  }
}

/**
 * The initial tail window: the last N complete lines of everything fed,
 * plus the unterminated fragment that follows them.
 *
 * With `lastN <= 0` nothing is retained: each completed line goes to
 * `onLine` as soon as it is fed. Otherwise lines are held in a ring until
 * `flush()`.
 */
export class TailWindow {
  readonly splitter = new LineSplitter();
  private readonly ring: LineRing | null;
  private emitted = 0;

  constructor(
    lastN: number,
    private readonly onLine: (line: string) => void
  ) {
    this.ring = lastN > 0 ? new LineRing(lastN) : null;
  }

  feed(chunk: Buffer): void {
    for (const line of this.splitter.push(chunk)) {
      if (this.ring) {
        this.ring.push(line);
      } else {
        this.emit(line);
      }
    }
  }

  /**
   * Emit the retained lines. Returns the number of lines emitted in total.
   */
  flush(): number {
    if (this.ring) {
      for (const line of this.ring.toArray()) {
        this.emit(line);
      }
    }
    return this.emitted;
  }

  private emit(line: string): void {
    this.onLine(line);
    this.emitted++;
  }
}
