/**
 * Stdio transport
 *
 * Reads newline-delimited JSON-RPC frames from an input stream, hands them
 * to the handler one at a time and writes each response before the next
 * frame is handled. Frames are read ahead into a queue so cancellations
 * can reach requests that are still waiting.
 *
 * @internal
 */

import type { Readable, Writable } from 'node:stream';
import type { MCPHandler } from '../mcp/handler.js';
import type { JsonRpcResponse } from '../mcp/types.js';
import type { Logger } from '../utils/logger.js';
import { createSilentLogger } from '../utils/logger.js';
import { AsyncQueue } from './async-queue.js';
import { DEFAULT_MAX_FRAME_BYTES, FrameDecoder, FrameWriter, type FrameEvent } from './frame-codec.js';

/** Pause reading when this many frames are waiting */
const HIGH_WATER_FRAMES = 256;
const LOW_WATER_FRAMES = 64;

export interface StdioTransportOptions {
  input: Readable;
  output: Writable;
  handler: MCPHandler;
  logger?: Logger;
  maxFrameBytes?: number;
}

/**
 * @example
 * ```typescript
 * const transport = new StdioTransport({ input: process.stdin, output: process.stdout, handler });
 * await transport.run();
 * ```
 */
export class StdioTransport {
  private readonly input: Readable;
  private readonly handler: MCPHandler;
  private readonly logger: Logger;
  private readonly decoder: FrameDecoder;
  private readonly writer: FrameWriter;
  private readonly queue = new AsyncQueue<FrameEvent>();
  private running = false;

  constructor(options: StdioTransportOptions) {
    this.input = options.input;
    this.handler = options.handler;
    this.logger = options.logger ?? createSilentLogger();
    this.decoder = new FrameDecoder(options.maxFrameBytes ?? DEFAULT_MAX_FRAME_BYTES);
    this.writer = new FrameWriter(options.output);
  }

  /**
   * Serve until the input ends
   *
   * Resolves on end of input. Rejects with TransportClosedError when a
   * response cannot be written; the session is closed either way.
   */
  async run(): Promise<void> {
    if (this.running) {
      throw new Error('Transport is already running');
    }
    this.running = true;

    const onData = (chunk: Buffer | string): void => this.onData(chunk);
    const onEnd = (): void => this.onEnd();
    const onError = (error: Error): void => {
      this.logger.error('Input stream failed', { error });
      this.queue.close();
    };

    this.input.on('data', onData);
    this.input.once('end', onEnd);
    this.input.once('error', onError);
    this.logger.debug('Transport started');

    try {
      for await (const event of this.queue) {
        if (this.queue.size < LOW_WATER_FRAMES && this.input.isPaused()) {
          this.input.resume();
        }
        const response = await this.respond(event);
        if (response) {
          await this.writer.write(response);
        }
      }
    } catch (error) {
      this.logger.error('Transport closed', { error });
      this.input.destroy();
      throw error;
    } finally {
      this.input.off('data', onData);
      this.input.off('end', onEnd);
      this.input.off('error', onError);
      this.queue.close();
      this.handler.close();
    }
  }

  private respond(event: FrameEvent): Promise<JsonRpcResponse | null> {
    switch (event.kind) {
      case 'frame':
        return this.handler.handleFrame(event.text);
      case 'oversized':
        return Promise.resolve(this.handler.rejectFrame(`frame exceeds ${event.limit} bytes`));
      case 'malformed':
        return Promise.resolve(this.handler.rejectFrame(event.reason));
    }
  }

  private onData(chunk: Buffer | string): void {
    const bytes = typeof chunk === 'string' ? Buffer.from(chunk, 'utf8') : chunk;
    for (const event of this.decoder.push(bytes)) {
      if (event.kind === 'frame') {
        this.handler.preview(event.text);
      }
      this.queue.push(event);
    }
    if (this.queue.size >= HIGH_WATER_FRAMES) {
      this.input.pause();
    }
  }

  private onEnd(): void {
    const dropped = this.decoder.end();
    if (dropped > 0) {
      this.logger.warn('Discarding unterminated final line', { bytes: dropped });
    }
    this.logger.debug('Input ended');
    this.queue.close();
  }
}
