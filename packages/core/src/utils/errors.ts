/**
 * Error utilities
 *
 * Domain errors are what handlers throw when a request cannot be served for
 * a reason the caller may act on. Anything else thrown by a handler is an
 * internal failure and is reported without detail.
 */

import type { ErrorCode, ToolContent, ToolError, ToolResult } from '../types/public-api.js';

/**
 * Handler-reported failure, distinct from protocol errors
 *
 * The message is sent to the client as-is, so keep it free of internals.
 *
 * @example
 * ```typescript
 * throw new DomainError('NOT_FOUND', `No such file: ${filename}`);
 * ```
 */
export class DomainError extends Error {
  override readonly name = 'DomainError';

  constructor(
    readonly code: ErrorCode,
    message: string,
    readonly details?: Record<string, unknown>
  ) {
    super(message);
  }
}

export function isDomainError(error: unknown): error is DomainError {
  return error instanceof DomainError;
}

/**
 * Create a structured tool error result (`isError: true`)
 *
 * `retryable` falls back to what the error code implies.
 */
export function createToolError(error: ToolError): ToolResult {
  return {
    content: [{
      type: 'text',
      text: JSON.stringify({
        error: error.code,
        message: error.message,
        retryable: error.retryable ?? isRetryable(error.code),
        ...(error.retryAfterMs !== undefined ? { retryAfterMs: error.retryAfterMs } : {}),
        ...(error.details ? { details: sanitizeDetails(error.details) } : {}),
      }),
    }],
    isError: true,
  };
}

/**
 * Create a tool success result
 */
export function createToolResult(content: ToolContent[]): ToolResult {
  return { content, isError: false };
}

/**
 * Create a single-text tool result
 */
export function textResult(text: string, isError = false): ToolResult {
  return { content: [{ type: 'text', text }], isError };
}

/**
 * Sanitize error details for LLM consumption
 */
export function sanitizeDetails(details: unknown): Record<string, unknown> {
  if (typeof details !== 'object' || details === null) {
    return {};
  }

  const sanitized: Record<string, unknown> = {};
  const sensitive = ['password', 'secret', 'key', 'token', 'auth', 'credential'];

  for (const [key, value] of Object.entries(details)) {
    const lowerKey = key.toLowerCase();
    if (sensitive.some(s => lowerKey.includes(s))) {
      continue;
    }
    if (typeof value === 'string' && value.includes('/')) {
      // Skip file paths
      continue;
    }
    sanitized[key] = value;
  }

  return sanitized;
}

/**
 * Check if an error code is retryable
 */
export function isRetryable(code: ErrorCode): boolean {
  return ['RATE_LIMIT', 'EXTERNAL_API_ERROR', 'TIMEOUT'].includes(code);
}

export const errors = {
  DomainError,
  isDomainError,
  createToolError,
  createToolResult,
  textResult,
  sanitizeDetails,
  isRetryable,
};
