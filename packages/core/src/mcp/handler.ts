/**
 * MCP Protocol Handler
 *
 * Main entry point for handling MCP JSON-RPC frames: envelope validation,
 * then dispatch. Transport-agnostic; the stdio transport feeds it lines.
 *
 * @internal
 */

import type { CapabilitySet } from '../types/public-api.js';
import { createSilentLogger, type Logger } from '../utils/logger.js';
import type { JsonRpcResponse } from './types.js';
import { createRegistries, type CapabilityRegistries } from './registry.js';
import { Session } from './session.js';
import type { ServerIdentity } from './lifecycle.js';
import { Dispatcher } from './dispatcher.js';
import { parseEnvelope } from './envelope.js';
import { parseError } from './errors.js';
import { cancelledParamsSchema } from './params.js';

/**
 * MCP Handler options
 */
export interface MCPHandlerOptions {
  server: ServerIdentity;
  capabilities?: CapabilitySet;
  /** Pre-built registries; takes precedence over `capabilities` */
  registries?: CapabilityRegistries;
  logger?: Logger;
  handlerTimeoutMs?: number;
}

/**
 * MCP Protocol Handler
 *
 * One handler serves one session.
 *
 * @example
 * ```typescript
 * const handler = new MCPHandler({
 *   server: { name: 'demo', version: '1.0.0' },
 *   capabilities: { tools: [greetTool] },
 * });
 *
 * const response = await handler.handleFrame('{"jsonrpc":"2.0","id":1,"method":"ping"}');
 * ```
 */
export class MCPHandler {
  readonly session = new Session();
  readonly registries: CapabilityRegistries;
  private readonly logger: Logger;
  private readonly dispatcher: Dispatcher;

  constructor(options: MCPHandlerOptions) {
    this.registries = options.registries ?? createRegistries(options.capabilities);
    this.logger = options.logger ?? createSilentLogger();
    this.dispatcher = new Dispatcher({
      session: this.session,
      registries: this.registries,
      server: options.server,
      logger: this.logger.child('dispatcher'),
      handlerTimeoutMs: options.handlerTimeoutMs,
    });
  }

  /**
   * Handle one frame of text
   *
   * @returns The response to write, or null when nothing is owed
   */
  async handleFrame(frame: string): Promise<JsonRpcResponse | null> {
    const parsed = parseEnvelope(frame);
    if (!parsed.ok) {
      this.logger.debug('Rejected frame', { code: parsed.error.code, message: parsed.error.message });
      if (parsed.notification) {
        return null;
      }
      return { jsonrpc: '2.0', id: parsed.id, error: parsed.error.toJSON() };
    }
    return this.dispatcher.dispatch(parsed.message);
  }

  /**
   * Response for a frame the codec could not deliver (oversized, not UTF-8)
   */
  rejectFrame(details: string): JsonRpcResponse {
    this.logger.warn('Rejected frame', { details });
    return { jsonrpc: '2.0', id: null, error: parseError(details).toJSON() };
  }

  /**
   * Look at a frame that is queued but not yet handled
   *
   * Only cancellations act early: they have to reach a request before it
   * starts, or while its handler is being waited on.
   */
  preview(frame: string): void {
    if (!frame.includes('notifications/cancelled')) {
      return;
    }
    const parsed = parseEnvelope(frame);
    if (!parsed.ok || parsed.message.kind !== 'notification' || parsed.message.method !== 'notifications/cancelled') {
      return;
    }
    const params = cancelledParamsSchema.safeParse(parsed.message.params ?? {});
    if (params.success) {
      this.dispatcher.cancel(params.data.requestId);
    }
  }

  /**
   * End the session
   */
  close(): void {
    if (this.session.status !== 'closed') {
      this.session.close();
      this.logger.info('Session closed');
    }
  }
}
