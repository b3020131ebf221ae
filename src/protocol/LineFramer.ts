import { StringDecoder } from 'node:string_decoder';

/** Lines longer than this are discarded instead of growing the buffer forever. */
export const DEFAULT_MAX_LINE_LENGTH = 8 * 1024 * 1024;

export interface FramerPushResult {
  lines: string[];
  /** Number of characters thrown away because a line exceeded the limit. */
  discarded: number;
}

/**
 * Re-assembles newline-delimited text from arbitrarily split chunks.
 * Multi-byte UTF-8 sequences split across chunks are decoded correctly.
 */
export class LineFramer {
  private buffer = '';
  private readonly decoder = new StringDecoder('utf8');
  private discarding = false;

  constructor(private readonly maxLineLength: number = DEFAULT_MAX_LINE_LENGTH) {}

  push(chunk: string | Uint8Array): FramerPushResult {
    const text = typeof chunk === 'string' ? chunk : this.decoder.write(Buffer.from(chunk));
    const lines: string[] = [];
    let discarded = 0;

    this.buffer += text;
    let newline = this.buffer.indexOf('\n');
    while (newline !== -1) {
      const raw = this.buffer.slice(0, newline);
      this.buffer = this.buffer.slice(newline + 1);
      if (this.discarding) {
        // tail of an oversized line
        discarded += raw.length;
        this.discarding = false;
      } else {
        const line = raw.endsWith('\r') ? raw.slice(0, -1) : raw;
        if (line.trim().length > 0) lines.push(line);
      }
      newline = this.buffer.indexOf('\n');
    }

    if (this.buffer.length > this.maxLineLength) {
      discarded += this.buffer.length;
      this.buffer = '';
      this.discarding = true;
    }

    return { lines, discarded };
  }

  /** Characters held while waiting for a newline. */
  get pendingLength(): number {
    return this.buffer.length;
  }

  reset(): void {
    this.buffer = '';
    this.discarding = false;
  }
}
