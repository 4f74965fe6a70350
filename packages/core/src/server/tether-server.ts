/**
 * Tether Server
 *
 * Main entry point: assembles config, logger and the capability registries,
 * then serves one session over a pair of streams.
 *
 * @public
 */

import type { Readable, Writable } from 'node:stream';
import type {
  TetherConfig,
  TetherTool,
  TetherResource,
  TetherResourceTemplate,
  TetherPrompt,
} from '../types/public-api.js';
import { MCPHandler } from '../mcp/handler.js';
import { createRegistries, type CapabilityRegistries } from '../mcp/registry.js';
import { StdioTransport } from '../transport/stdio.js';
import { resolveConfig, type ConfigOverrides, type ResolvedConfig } from '../config/config.js';
import { createLogger, type Logger } from '../utils/logger.js';
import { VERSION } from '../version.js';

/**
 * Tether Server options
 */
export interface TetherServerOptions {
  config: TetherConfig;
  /** Environment-derived overrides (see `configFromEnv`) */
  overrides?: ConfigOverrides;
  tools?: TetherTool[];
  resources?: TetherResource[];
  resourceTemplates?: TetherResourceTemplate[];
  prompts?: TetherPrompt[];
  /** Root logger; defaults to stderr at the configured level */
  logger?: Logger;
}

/**
 * Tether Server
 *
 * Capabilities are fixed at construction. Registering the same name or URI
 * twice throws here, before anything is served.
 *
 * @example
 * ```typescript
 * const server = new TetherServer({
 *   config,
 *   tools: [greetTool],
 *   prompts: [reviewCodePrompt],
 * });
 *
 * await server.serveStdio();
 * ```
 *
 * @public
 */
export class TetherServer {
  /** Tether version */
  static readonly VERSION = VERSION;

  readonly config: ResolvedConfig;
  readonly logger: Logger;
  readonly registries: CapabilityRegistries;

  constructor(options: TetherServerOptions) {
    this.config = resolveConfig(options.config, options.overrides);
    this.logger = options.logger ?? createLogger({ level: this.config.logging.level });
    this.registries = createRegistries({
      tools: options.tools,
      resources: options.resources,
      resourceTemplates: options.resourceTemplates,
      prompts: options.prompts,
    });
  }

  /**
   * Create a handler for a new session
   */
  createHandler(): MCPHandler {
    return new MCPHandler({
      server: {
        name: this.config.mcp.serverName,
        version: this.config.app.version,
        instructions: this.config.mcp.instructions,
      },
      registries: this.registries,
      logger: this.logger,
      handlerTimeoutMs: this.config.dispatch.handlerTimeoutMs,
    });
  }

  /**
   * Serve one session over the given streams until the input ends
   *
   * @throws TransportClosedError when the output stream fails
   */
  async connect(input: Readable, output: Writable): Promise<void> {
    const transport = new StdioTransport({
      input,
      output,
      handler: this.createHandler(),
      logger: this.logger.child('transport'),
      maxFrameBytes: this.config.transport.maxFrameBytes,
    });

    this.logger.info('Serving', {
      server: this.config.mcp.serverName,
      tools: this.registries.tools.size,
      resources: this.registries.resources.size + this.registries.resourceTemplates.size,
      prompts: this.registries.prompts.size,
    });
    await transport.run();
  }

  /**
   * Serve over process stdin/stdout
   */
  serveStdio(): Promise<void> {
    return this.connect(process.stdin, process.stdout);
  }
}
