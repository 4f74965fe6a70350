/**
 * @tether/core
 *
 * Stable public API for Tether MCP servers
 *
 * @packageDocumentation
 */

// Re-export ONLY public API types
export type {
  // Configuration
  TetherConfig,

  // Logging
  Logger,
  LogLevel,

  // Handlers
  HandlerContext,
  PeerInfo,

  // Tools
  TetherTool,
  ToolAnnotations,
  ToolResult,
  ToolContent,
  TextContent,
  ImageContent,
  AudioContent,
  EmbeddedResource,
  JSONSchema,

  // Resources
  TetherResource,
  TetherResourceTemplate,
  ResourceContent,

  // Prompts
  TetherPrompt,
  PromptArgument,
  PromptMessage,

  // Capabilities
  CapabilitySet,

  // Errors
  ToolError,
  ErrorCode,

  // Validation
  ValidationResult,
  ValidationError,
} from './types/public-api.js';

// Re-export utility namespaces
export { errors, validation } from './utils/index.js';

// Direct utility exports (convenience)
export { DomainError, isDomainError, createToolError, createToolResult, textResult } from './utils/errors.js';
export { createLogger, createSilentLogger, streamSink, LOG_LEVELS, type LoggerOptions, type LogSink } from './utils/logger.js';

// Configuration
export {
  resolveConfig,
  configFromEnv,
  ConfigError,
  type ResolvedConfig,
  type ConfigOverrides,
} from './config/config.js';

// Protocol engine
export {
  MCPHandler,
  type MCPHandlerOptions,
  JSON_RPC_ERROR_CODES,
  PROTOCOL_VERSION,
  SUPPORTED_PROTOCOL_VERSIONS,
  ProtocolError,
} from './mcp/index.js';

// Re-export version
export { VERSION } from './version.js';

// Re-export main server class
export { TetherServer, type TetherServerOptions } from './server/tether-server.js';
