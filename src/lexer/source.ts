/**
 * Line Sources
 * Synchronous line-oriented readers feeding the line buffer
 */

import { readSync } from 'node:fs';

/** One read from a source: at most maxLength characters */
export interface LineChunk {
  readonly text: string;
  /** False when the chunk continues a physical line cut at the bound */
  readonly startsLine: boolean;
}

/**
 * Character stream owned by the driver.
 *
 * readLine returns at most maxLength characters, stopping after the first
 * newline (which is included). A physical line longer than maxLength comes
 * back in several chunks. Returns null once the input is exhausted.
 */
export interface LineSource {
  readLine(maxLength: number): LineChunk | null;
}

/** Size of each block read from a file descriptor */
const READ_BLOCK_SIZE = 4096;

/**
 * Shared chunking over a pull-based character supply.
 * `fill` returns the next block of text, or null at end of input.
 */
class ChunkReader implements LineSource {
  private pending = '';
  private atLineStart = true;
  private exhausted = false;

  constructor(private readonly fill: () => string | null) {}

  readLine(maxLength: number): LineChunk | null {
    const limit = Math.max(1, maxLength);

    for (;;) {
      // Only the bounded prefix can hold the end of this chunk
      const newline = this.pending.slice(0, limit).indexOf('\n');
      if (newline !== -1) {
        return this.take(newline + 1);
      }
      if (this.pending.length >= limit) {
        return this.take(limit);
      }
      if (this.exhausted) {
        return this.pending.length > 0 ? this.take(this.pending.length) : null;
      }

      const more = this.fill();
      if (more === null) {
        this.exhausted = true;
      } else {
        this.pending += more;
      }
    }
  }

  private take(length: number): LineChunk {
    const text = this.pending.slice(0, length);
    this.pending = this.pending.slice(length);
    const chunk = { text, startsLine: this.atLineStart };
    this.atLineStart = text.endsWith('\n');
    return chunk;
  }
}

/** Line source over an in-memory string */
export function createStringSource(text: string): LineSource {
  let consumed = false;
  return new ChunkReader(() => {
    if (consumed) return null;
    consumed = true;
    return text;
  });
}

/**
 * Line source over an open file descriptor. The descriptor stays owned by
 * the caller. Bytes are decoded as latin1 so that every byte is exactly one
 * character.
 */
export function createFileSource(fd: number): LineSource {
  const block = Buffer.alloc(READ_BLOCK_SIZE);
  return new ChunkReader(() => {
    const bytesRead = readSync(fd, block, 0, block.length, null);
    if (bytesRead === 0) return null;
    return block.toString('latin1', 0, bytesRead);
  });
}
