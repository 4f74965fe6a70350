/**
 * MCP JSON-RPC types
 * @internal
 */

import type {
  PeerInfo,
  PromptArgument,
  PromptMessage,
  ResourceContent,
  ToolAnnotations,
  ToolContent,
  JSONSchema,
} from '../types/public-api.js';

/**
 * JSON-RPC request id (integers only for numbers)
 */
export type JsonRpcId = string | number | null;

/**
 * Validated JSON-RPC 2.0 request (id present, possibly null)
 */
export interface JsonRpcRequest {
  kind: 'request';
  id: JsonRpcId;
  method: string;
  params?: JsonRpcParams;
}

/**
 * Validated JSON-RPC 2.0 notification (id absent)
 */
export interface JsonRpcNotification {
  kind: 'notification';
  method: string;
  params?: JsonRpcParams;
}

/**
 * What the envelope validator hands to the dispatcher
 */
export type IncomingMessage = JsonRpcRequest | JsonRpcNotification;

/**
 * Structured params (by-name object or by-position array)
 */
export type JsonRpcParams = Record<string, unknown> | unknown[];

/**
 * JSON-RPC 2.0 success response
 */
export interface JsonRpcSuccessResponse {
  jsonrpc: '2.0';
  id: JsonRpcId;
  result: unknown;
}

/**
 * JSON-RPC 2.0 error response
 */
export interface JsonRpcErrorResponse {
  jsonrpc: '2.0';
  id: JsonRpcId;
  error: JsonRpcError;
}

/**
 * JSON-RPC error object
 */
export interface JsonRpcError {
  code: number;
  message: string;
  data?: unknown;
}

/**
 * JSON-RPC response (success or error)
 */
export type JsonRpcResponse = JsonRpcSuccessResponse | JsonRpcErrorResponse;

/**
 * Standard JSON-RPC error codes
 */
export const JSON_RPC_ERROR_CODES = {
  // Standard JSON-RPC errors
  PARSE_ERROR: -32700,
  INVALID_REQUEST: -32600,
  METHOD_NOT_FOUND: -32601,
  INVALID_PARAMS: -32602,
  INTERNAL_ERROR: -32603,

  // Application errors (server-defined range: -32000 to -32099)
  NOT_INITIALIZED: -32001,
  CAPABILITY_NOT_FOUND: -32002,
  DOMAIN_ERROR: -32003,
} as const;

export type JsonRpcErrorCode = (typeof JSON_RPC_ERROR_CODES)[keyof typeof JSON_RPC_ERROR_CODES];

/**
 * Client capabilities
 */
export interface ClientCapabilities {
  roots?: {
    listChanged?: boolean;
  };
  sampling?: Record<string, unknown>;
  elicitation?: Record<string, unknown>;
  experimental?: Record<string, unknown>;
}

/**
 * Server capabilities returned in initialize response
 */
export interface ServerCapabilities {
  tools?: {
    listChanged?: boolean;
  };
  resources?: {
    subscribe?: boolean;
    listChanged?: boolean;
  };
  prompts?: {
    listChanged?: boolean;
  };
  logging?: Record<string, never>;
}

/**
 * MCP initialize request params
 */
export interface InitializeParams {
  protocolVersion: string;
  capabilities: ClientCapabilities;
  clientInfo: PeerInfo;
}

/**
 * Initialize result
 */
export interface InitializeResult {
  protocolVersion: string;
  capabilities: ServerCapabilities;
  serverInfo: PeerInfo;
  instructions?: string;
}

/**
 * Tool definition for tools/list
 */
export interface ToolDefinition {
  name: string;
  description: string;
  inputSchema: JSONSchema;
  annotations?: ToolAnnotations;
}

export interface ToolsListResult {
  tools: ToolDefinition[];
}

export interface ToolsCallResult {
  content: ToolContent[];
  isError: boolean;
}

/**
 * Resource definition for resources/list
 */
export interface ResourceDefinition {
  uri: string;
  name: string;
  description?: string;
  mimeType?: string;
}

export interface ResourcesListResult {
  resources: ResourceDefinition[];
}

/**
 * Resource template definition for resources/templates/list
 */
export interface ResourceTemplateDefinition {
  uriTemplate: string;
  name: string;
  description?: string;
  mimeType?: string;
}

export interface ResourceTemplatesListResult {
  resourceTemplates: ResourceTemplateDefinition[];
}

export interface ResourcesReadResult {
  contents: ResourceContent[];
}

/**
 * Prompt definition for prompts/list
 */
export interface PromptDefinition {
  name: string;
  description?: string;
  arguments?: PromptArgument[];
}

export interface PromptsListResult {
  prompts: PromptDefinition[];
}

export interface PromptsGetResult {
  description?: string;
  messages: PromptMessage[];
}
