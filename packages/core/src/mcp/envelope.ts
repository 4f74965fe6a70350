/**
 * JSON-RPC envelope validation
 *
 * Turns one frame of text into a request or notification. Nothing that
 * fails here is ever seen by the dispatcher or a handler.
 *
 * @internal
 */

import { z } from 'zod';
import { invalidRequest, parseError, type ProtocolError } from './errors.js';
import type { IncomingMessage, JsonRpcId } from './types.js';

const idSchema = z.union([z.string(), z.number().int(), z.null()]);

const envelopeSchema = z.object({
  jsonrpc: z.literal('2.0'),
  id: idSchema.optional(),
  method: z.string(),
  params: z.union([z.record(z.unknown()), z.array(z.unknown())]).optional(),
});

const FIELD_REASONS: Record<string, string> = {
  jsonrpc: 'jsonrpc must be "2.0"',
  id: 'id must be a string, integer or null',
  method: 'method must be a string',
  params: 'params must be an object or array',
};

/**
 * `notification` is set on a rejected object that carries no `id`; nothing
 * is ever owed to such a frame.
 */
export type EnvelopeResult =
  | { ok: true; message: IncomingMessage }
  | { ok: false; id: JsonRpcId; notification: boolean; error: ProtocolError };

/**
 * Decode and validate one frame
 *
 * @example
 * ```typescript
 * const parsed = parseEnvelope('{"jsonrpc":"2.0","id":1,"method":"ping"}');
 * if (parsed.ok && parsed.message.kind === 'request') {
 *   // parsed.message.id === 1
 * }
 * ```
 */
export function parseEnvelope(frame: string): EnvelopeResult {
  let raw: unknown;
  try {
    raw = JSON.parse(frame);
  } catch {
    return { ok: false, id: null, notification: false, error: parseError() };
  }
  return validateEnvelope(raw);
}

/**
 * Validate an already-decoded JSON value
 */
export function validateEnvelope(raw: unknown): EnvelopeResult {
  if (Array.isArray(raw)) {
    return { ok: false, id: null, notification: false, error: invalidRequest('batch requests are not supported') };
  }
  if (typeof raw !== 'object' || raw === null) {
    return { ok: false, id: null, notification: false, error: invalidRequest('message must be a JSON object') };
  }

  const parsed = envelopeSchema.safeParse(raw);
  if (!parsed.success) {
    const field = parsed.error.issues[0]?.path[0];
    const reason = typeof field === 'string' ? FIELD_REASONS[field] : undefined;
    return { ok: false, id: extractId(raw), notification: !('id' in raw), error: invalidRequest(reason) };
  }

  const { id, method, params } = parsed.data;
  if (!('id' in raw)) {
    return { ok: true, message: { kind: 'notification', method, params } };
  }
  return { ok: true, message: { kind: 'request', id: id ?? null, method, params } };
}

/**
 * Extract id from a potentially invalid message for error responses
 */
export function extractId(raw: object): JsonRpcId {
  if (!('id' in raw)) {
    return null;
  }
  const parsed = idSchema.safeParse(raw.id);
  return parsed.success ? parsed.data : null;
}
