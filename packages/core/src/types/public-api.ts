/**
 * @packageDocumentation
 * Tether Core Public API
 *
 * This file defines the stable public API for @tether/core.
 * Only types exported here are guaranteed to be stable.
 *
 * @version 0.1.0
 */

import type { Logger, LogLevel } from '../utils/logger.js';

export type { Logger, LogLevel };

// ============================================================================
// Configuration
// ============================================================================

/**
 * Main configuration for a Tether server
 *
 * Only `app` and `mcp` are required; everything else falls back to the
 * defaults applied by `resolveConfig()`.
 *
 * @public
 */
export interface TetherConfig {
  /** Application metadata */
  app: {
    /** Application name */
    name: string;
    /** Application description */
    description: string;
    /** Application version (reported as serverInfo.version) */
    version: string;
  };

  /** MCP protocol configuration */
  mcp: {
    /** Server name for MCP handshake */
    serverName: string;
    /** Optional usage instructions returned from initialize */
    instructions?: string;
  };

  /** Stream framing limits */
  transport?: {
    /** Maximum size of one inbound line in bytes (default: 4 MiB) */
    maxFrameBytes?: number;
  };

  /** Handler invocation policy */
  dispatch?: {
    /** Bounded wait for a single handler invocation (default: 30000) */
    handlerTimeoutMs?: number;
  };

  /** Out-of-band session token gate (checked before the stream is served) */
  auth?: {
    /** Expected token; the gate is disabled when unset */
    sessionToken?: string;
  };

  /** Diagnostic logging (always written to stderr, never stdout) */
  logging?: {
    /** Minimum level (default: 'info') */
    level?: LogLevel;
  };
}

// ============================================================================
// Handler Context
// ============================================================================

/**
 * Identity a peer reports during the initialize handshake
 * @public
 */
export interface PeerInfo {
  name: string;
  version: string;
}

/**
 * Context passed to tool, resource and prompt handlers
 * @public
 */
export interface HandlerContext {
  /** JSON-RPC id of the request being served */
  requestId: string | number | null;
  /** Aborted when the invocation times out or is cancelled */
  signal: AbortSignal;
  /** Logger scoped to the capability */
  logger: Logger;
  /** Client identity negotiated at initialize */
  peer: Readonly<PeerInfo>;
}

// ============================================================================
// Tool System
// ============================================================================

/**
 * Behavioural hints for clients (never trusted for security decisions)
 * @public
 */
export interface ToolAnnotations {
  title?: string;
  readOnlyHint?: boolean;
  destructiveHint?: boolean;
  idempotentHint?: boolean;
  openWorldHint?: boolean;
}

/**
 * Tool definition interface
 *
 * `handler` only ever sees input that passed `inputSchema`, so `TInput`
 * may describe the validated shape.
 *
 * @public
 */
export interface TetherTool<TInput extends object = Record<string, unknown>> {
  /** Tool name, unique within the server */
  name: string;
  /** Human-readable description */
  description: string;
  /** JSON Schema for input validation */
  inputSchema: JSONSchema;
  /** Optional behavioural hints */
  annotations?: ToolAnnotations;
  /** Tool handler function */
  handler(input: TInput, ctx: HandlerContext): Promise<ToolResult>;
}

/**
 * Tool execution result
 * @public
 */
export interface ToolResult {
  /** Result content (MCP format) */
  content: ToolContent[];
  /** Whether this is a tool-level error result */
  isError?: boolean;
}

/**
 * Text content from a tool
 * @public
 */
export interface TextContent {
  type: 'text';
  text: string;
}

/**
 * Image content from a tool
 * @public
 */
export interface ImageContent {
  type: 'image';
  /** Base64-encoded image data */
  data: string;
  mimeType: string;
}

/**
 * Audio content from a tool
 * @public
 */
export interface AudioContent {
  type: 'audio';
  /** Base64-encoded audio data */
  data: string;
  mimeType: string;
}

/**
 * Embedded resource from a tool or prompt
 * @public
 */
export interface EmbeddedResource {
  type: 'resource';
  resource: ResourceContent;
}

/**
 * Tool content (MCP format) - discriminated union
 * @public
 */
export type ToolContent = TextContent | ImageContent | AudioContent | EmbeddedResource;

/**
 * JSON Schema definition
 * @public
 */
export interface JSONSchema {
  type: string;
  properties?: Record<string, JSONSchema>;
  required?: string[];
  items?: JSONSchema;
  enum?: unknown[];
  minimum?: number;
  maximum?: number;
  description?: string;
  default?: unknown;
  [key: string]: unknown;
}

// ============================================================================
// Resources
// ============================================================================

/**
 * Resource definition (MCP resources/list, resources/read)
 * @public
 */
export interface TetherResource {
  /** Unique resource URI */
  uri: string;
  /** Human-readable name */
  name: string;
  /** Resource description */
  description?: string;
  /** MIME type */
  mimeType?: string;
  /** Resource handler - returns content */
  handler(ctx: HandlerContext): Promise<ResourceContent>;
}

/**
 * Parameterized resource (MCP resources/templates/list)
 *
 * `uriTemplate` uses level-1 RFC 6570 expressions, e.g. `file:///data/{filename}`.
 * Each `{var}` matches exactly one path segment.
 *
 * @public
 */
export interface TetherResourceTemplate {
  /** URI template */
  uriTemplate: string;
  /** Human-readable name */
  name: string;
  /** Template description */
  description?: string;
  /** MIME type shared by matching resources, when known */
  mimeType?: string;
  /** Reads one concrete resource matched by the template */
  handler(uri: string, variables: Record<string, string>, ctx: HandlerContext): Promise<ResourceContent>;
}

/**
 * Resource content
 * @public
 */
export interface ResourceContent {
  /** Resource URI */
  uri: string;
  /** MIME type */
  mimeType?: string;
  /** Text content (for text resources) */
  text?: string;
  /** Binary content as base64 (for binary resources) */
  blob?: string;
}

// ============================================================================
// Prompts
// ============================================================================

/**
 * Prompt template definition (MCP prompts/list, prompts/get)
 * @public
 */
export interface TetherPrompt {
  /** Unique prompt name */
  name: string;
  /** Human-readable description */
  description?: string;
  /** Prompt arguments */
  arguments?: PromptArgument[];
  /** Prompt handler - returns messages */
  handler(args: Record<string, string>, ctx: HandlerContext): Promise<PromptMessage[]>;
}

/**
 * Prompt argument definition
 * @public
 */
export interface PromptArgument {
  /** Argument name */
  name: string;
  /** Argument description */
  description?: string;
  /** Whether argument is required */
  required?: boolean;
}

/**
 * Prompt message (returned by prompts/get)
 * @public
 */
export interface PromptMessage {
  /** Message role */
  role: 'user' | 'assistant';
  /** Message content */
  content: ToolContent;
}

// ============================================================================
// Capability Set
// ============================================================================

/**
 * Everything a server exposes, assembled once at startup
 * @public
 */
export interface CapabilitySet {
  tools?: TetherTool[];
  resources?: TetherResource[];
  resourceTemplates?: TetherResourceTemplate[];
  prompts?: TetherPrompt[];
}

// ============================================================================
// Errors
// ============================================================================

/**
 * Structured tool error
 * @public
 */
export interface ToolError {
  /** Error code for programmatic handling */
  code: ErrorCode;
  /** Human-readable message (safe for LLM) */
  message: string;
  /** Whether the LLM should retry this operation (default: from `code`) */
  retryable?: boolean;
  /** Suggested wait time before retry (ms) */
  retryAfterMs?: number;
  /** Sanitized details, scrubbed of secrets */
  details?: Record<string, unknown>;
}

/**
 * Standard error codes
 * @public
 */
export type ErrorCode =
  | 'VALIDATION_ERROR'      // Bad input from LLM
  | 'NOT_FOUND'             // Resource doesn't exist
  | 'FORBIDDEN'             // Request understood but not allowed
  | 'RATE_LIMIT'            // Too many requests (retryable)
  | 'EXTERNAL_API_ERROR'    // Third-party API failed (retryable)
  | 'TIMEOUT'               // Operation took too long (retryable)
  | 'INTERNAL_ERROR';       // Unexpected failure

// ============================================================================
// Validation
// ============================================================================

/**
 * Validation result
 * @public
 */
export interface ValidationResult {
  /** Whether validation passed */
  valid: boolean;
  /** Validation errors (if any) */
  errors?: ValidationError[];
}

/**
 * Validation error
 * @public
 */
export interface ValidationError {
  /** JSON path to invalid field */
  path: string;
  /** Error message */
  message: string;
}
