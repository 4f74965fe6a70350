/**
 * MCP Protocol module
 * @internal
 */

// Main handler
export { MCPHandler, type MCPHandlerOptions } from './handler.js';
export { Dispatcher, DEFAULT_HANDLER_TIMEOUT_MS, type DispatcherOptions } from './dispatcher.js';
export { Session, type SessionState, type SessionStatus } from './session.js';
export { parseEnvelope, validateEnvelope, type EnvelopeResult } from './envelope.js';
export {
  CapabilityRegistry,
  createRegistries,
  matchUriTemplate,
  type CapabilityRegistries,
} from './registry.js';

// Types
export type {
  JsonRpcId,
  JsonRpcRequest,
  JsonRpcNotification,
  IncomingMessage,
  JsonRpcParams,
  JsonRpcSuccessResponse,
  JsonRpcErrorResponse,
  JsonRpcResponse,
  JsonRpcError,
  InitializeParams,
  InitializeResult,
  ServerCapabilities,
  ClientCapabilities,
  ToolsListResult,
  ToolsCallResult,
  ToolDefinition,
  ResourcesListResult,
  ResourcesReadResult,
  ResourceDefinition,
  ResourceTemplateDefinition,
  ResourceTemplatesListResult,
  PromptsListResult,
  PromptsGetResult,
  PromptDefinition,
} from './types.js';
export type { MCPMethod } from './methods.js';

export { JSON_RPC_ERROR_CODES } from './types.js';

// Lifecycle
export {
  PROTOCOL_VERSION,
  SUPPORTED_PROTOCOL_VERSIONS,
  buildCapabilities,
  negotiateProtocolVersion,
  type ServerIdentity,
} from './lifecycle.js';

// Errors (for custom error handling)
export {
  ProtocolError,
  createError,
  createErrorResponse,
  parseError,
  invalidRequest,
  methodNotFound,
  invalidParams,
  internalError,
  notInitialized,
  toolNotFound,
  resourceNotFound,
  promptNotFound,
  toErrorResponse,
} from './errors.js';
