/**
 * Newline-delimited frame codec
 *
 * One frame is one UTF-8 line holding one JSON document. The decoder works
 * on bytes so the size limit is enforced before a line is ever decoded.
 *
 * @internal
 */

import type { Writable } from 'node:stream';

export const DEFAULT_MAX_FRAME_BYTES = 4 * 1024 * 1024;

const NEWLINE = 0x0a;

export type FrameEvent =
  | { kind: 'frame'; text: string }
  | { kind: 'oversized'; limit: number }
  | { kind: 'malformed'; reason: string };

export class FrameDecoder {
  private chunks: Uint8Array[] = [];
  private buffered = 0;
  private discarding = false;
  private readonly utf8 = new TextDecoder('utf-8', { fatal: true });

  constructor(readonly maxFrameBytes: number = DEFAULT_MAX_FRAME_BYTES) {}

  /**
   * Feed bytes; returns the events completed by this chunk, in order
   *
   * An oversized line is reported once, as soon as it crosses the limit,
   * and everything up to its terminator is dropped.
   */
  push(chunk: Uint8Array): FrameEvent[] {
    const events: FrameEvent[] = [];
    let start = 0;

    while (start < chunk.length) {
      const newline = chunk.indexOf(NEWLINE, start);
      const end = newline === -1 ? chunk.length : newline;

      if (!this.discarding && end > start) {
        if (this.buffered + (end - start) > this.maxFrameBytes) {
          this.reset();
          this.discarding = true;
          events.push({ kind: 'oversized', limit: this.maxFrameBytes });
        } else {
          this.chunks.push(chunk.slice(start, end));
          this.buffered += end - start;
        }
      }

      if (newline === -1) {
        break;
      }

      if (this.discarding) {
        this.discarding = false;
      } else {
        const event = this.takeLine();
        if (event) {
          events.push(event);
        }
      }
      start = newline + 1;
    }

    return events;
  }

  /**
   * Input ended
   *
   * @returns Bytes of the unterminated final line that were dropped
   */
  end(): number {
    const dropped = this.buffered;
    this.reset();
    this.discarding = false;
    return dropped;
  }

  private takeLine(): FrameEvent | null {
    const bytes = Buffer.concat(this.chunks, this.buffered);
    this.reset();

    let text: string;
    try {
      text = this.utf8.decode(bytes);
    } catch {
      return { kind: 'malformed', reason: 'frame is not valid UTF-8' };
    }

    if (text.endsWith('\r')) {
      text = text.slice(0, -1);
    }
    if (text.trim().length === 0) {
      return null;
    }
    return { kind: 'frame', text };
  }

  private reset(): void {
    this.chunks = [];
    this.buffered = 0;
  }
}

/**
 * Serialize one message as a frame
 *
 * JSON.stringify never emits a raw line terminator, so the only `\n` is the
 * frame terminator.
 */
export function encodeFrame(message: unknown): string {
  return `${JSON.stringify(message)}\n`;
}

/**
 * The output stream failed; the session cannot continue
 */
export class TransportClosedError extends Error {
  override readonly name = 'TransportClosedError';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

/**
 * Writes frames to a stream, one at a time
 */
export class FrameWriter {
  private closed = false;

  constructor(private readonly output: Writable) {}

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Write one frame; resolves once the stream has accepted it
   *
   * @throws TransportClosedError when the stream is gone or the write fails
   */
  write(message: unknown): Promise<void> {
    if (this.closed || this.output.destroyed || this.output.writableEnded) {
      this.closed = true;
      return Promise.reject(new TransportClosedError('Output stream is closed'));
    }

    const frame = encodeFrame(message);
    return new Promise<void>((resolve, reject) => {
      this.output.write(frame, 'utf8', (error) => {
        if (error) {
          this.closed = true;
          reject(new TransportClosedError('Failed to write frame', { cause: error }));
          return;
        }
        resolve();
      });
    });
  }
}
