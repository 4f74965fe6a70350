/**
 * MCP JSON-RPC error utilities
 *
 * Every failure in the pipeline ends up in `toErrorResponse()`. Protocol
 * errors and domain errors carry client-safe messages; anything else is
 * logged in full and answered with a bare "Internal error".
 *
 * @internal
 */

import type { ErrorCode } from '../types/public-api.js';
import type { Logger } from '../utils/logger.js';
import { isDomainError, sanitizeDetails } from '../utils/errors.js';
import type { JsonRpcError, JsonRpcErrorResponse, JsonRpcId } from './types.js';
import { JSON_RPC_ERROR_CODES } from './types.js';

/**
 * Error with a JSON-RPC code and a message that is safe to send
 */
export class ProtocolError extends Error {
  override readonly name = 'ProtocolError';

  constructor(
    readonly code: number,
    message: string,
    readonly data?: unknown
  ) {
    super(message);
  }

  toJSON(): JsonRpcError {
    return createError(this.code, this.message, this.data);
  }
}

/**
 * Create a JSON-RPC error object
 */
export function createError(
  code: number,
  message: string,
  data?: unknown
): JsonRpcError {
  return {
    code,
    message,
    ...(data !== undefined && { data }),
  };
}

/**
 * Create a JSON-RPC error response
 */
export function createErrorResponse(
  id: JsonRpcId,
  code: number,
  message: string,
  data?: unknown
): JsonRpcErrorResponse {
  return {
    jsonrpc: '2.0',
    id,
    error: createError(code, message, data),
  };
}

// Pre-built error factories for common errors

/**
 * Parse error - Invalid JSON was received (or the frame could not be read)
 */
export function parseError(details?: string): ProtocolError {
  return new ProtocolError(
    JSON_RPC_ERROR_CODES.PARSE_ERROR,
    'Parse error',
    details ? { details } : undefined
  );
}

/**
 * Invalid request - JSON is not a valid Request object
 */
export function invalidRequest(details?: string): ProtocolError {
  return new ProtocolError(
    JSON_RPC_ERROR_CODES.INVALID_REQUEST,
    details ? `Invalid request: ${details}` : 'Invalid request'
  );
}

/**
 * Method not found - The method does not exist
 */
export function methodNotFound(method: string): ProtocolError {
  return new ProtocolError(
    JSON_RPC_ERROR_CODES.METHOD_NOT_FOUND,
    `Method not found: ${method}`
  );
}

/**
 * Invalid params - Invalid method parameters
 */
export function invalidParams(details?: unknown): ProtocolError {
  return new ProtocolError(
    JSON_RPC_ERROR_CODES.INVALID_PARAMS,
    'Invalid params',
    details
  );
}

/**
 * Internal error - the message never carries the underlying cause
 */
export function internalError(reason?: 'timeout' | 'cancelled'): ProtocolError {
  if (reason === 'timeout') {
    return new ProtocolError(JSON_RPC_ERROR_CODES.INTERNAL_ERROR, 'Request timed out');
  }
  if (reason === 'cancelled') {
    return new ProtocolError(JSON_RPC_ERROR_CODES.INTERNAL_ERROR, 'Request cancelled');
  }
  return new ProtocolError(JSON_RPC_ERROR_CODES.INTERNAL_ERROR, 'Internal error');
}

/**
 * Capability method called before the initialize handshake
 */
export function notInitialized(): ProtocolError {
  return new ProtocolError(
    JSON_RPC_ERROR_CODES.NOT_INITIALIZED,
    'Server not initialized'
  );
}

/**
 * Tool not found
 */
export function toolNotFound(name: string): ProtocolError {
  return new ProtocolError(
    JSON_RPC_ERROR_CODES.CAPABILITY_NOT_FOUND,
    `Tool not found: ${name}`,
    { name }
  );
}

/**
 * Resource not found
 */
export function resourceNotFound(uri: string): ProtocolError {
  return new ProtocolError(
    JSON_RPC_ERROR_CODES.CAPABILITY_NOT_FOUND,
    `Resource not found: ${uri}`,
    { uri }
  );
}

/**
 * Prompt not found
 */
export function promptNotFound(name: string): ProtocolError {
  return new ProtocolError(
    JSON_RPC_ERROR_CODES.CAPABILITY_NOT_FOUND,
    `Prompt not found: ${name}`,
    { name }
  );
}

/**
 * JSON-RPC code for a domain error code
 */
export function domainErrorCode(code: ErrorCode): number {
  switch (code) {
    case 'VALIDATION_ERROR':
      return JSON_RPC_ERROR_CODES.INVALID_PARAMS;
    case 'NOT_FOUND':
      return JSON_RPC_ERROR_CODES.CAPABILITY_NOT_FOUND;
    default:
      return JSON_RPC_ERROR_CODES.DOMAIN_ERROR;
  }
}

/**
 * Map any failure to a JSON-RPC error response
 */
export function toErrorResponse(
  id: JsonRpcId,
  error: unknown,
  logger: Logger
): JsonRpcErrorResponse {
  if (error instanceof ProtocolError) {
    return { jsonrpc: '2.0', id, error: error.toJSON() };
  }

  if (isDomainError(error)) {
    logger.info('Handler reported domain error', { id, code: error.code, message: error.message });
    return createErrorResponse(
      id,
      domainErrorCode(error.code),
      error.message,
      { code: error.code, ...(error.details && { details: sanitizeDetails(error.details) }) }
    );
  }

  logger.error('Unhandled failure', { id, error });
  return { jsonrpc: '2.0', id, error: internalError().toJSON() };
}
