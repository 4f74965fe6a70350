import { describe, it, expect } from 'vitest';
import { parseEnvelope, validateEnvelope } from '../envelope.js';
import { JSON_RPC_ERROR_CODES } from '../types.js';

describe('parseEnvelope', () => {
  it('should decode a request', () => {
    expect(parseEnvelope('{"jsonrpc":"2.0","id":7,"method":"tools/list","params":{}}')).toEqual({
      ok: true,
      message: { kind: 'request', id: 7, method: 'tools/list', params: {} },
    });
  });

  it('should decode a notification when id is absent', () => {
    expect(parseEnvelope('{"jsonrpc":"2.0","method":"notifications/initialized"}')).toEqual({
      ok: true,
      message: { kind: 'notification', method: 'notifications/initialized' },
    });
  });

  it('should treat an explicit null id as a request', () => {
    const result = parseEnvelope('{"jsonrpc":"2.0","id":null,"method":"ping"}');
    expect(result).toEqual({ ok: true, message: { kind: 'request', id: null, method: 'ping' } });
  });

  it('should keep string ids and positional params', () => {
    const result = parseEnvelope('{"jsonrpc":"2.0","id":"abc","method":"x","params":[1,2]}');
    expect(result).toEqual({ ok: true, message: { kind: 'request', id: 'abc', method: 'x', params: [1, 2] } });
  });

  it('should report a parse error with a null id for invalid JSON', () => {
    const result = parseEnvelope('{not json');
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.id).toBeNull();
      expect(result.error.code).toBe(JSON_RPC_ERROR_CODES.PARSE_ERROR);
      expect(result.error.message).toBe('Parse error');
    }
  });
});

describe('validateEnvelope', () => {
  function rejection(raw: unknown) {
    const result = validateEnvelope(raw);
    if (result.ok) {
      throw new Error('expected the envelope to be rejected');
    }
    return { id: result.id, code: result.error.code, message: result.error.message };
  }

  it('should reject batches', () => {
    expect(rejection([{ jsonrpc: '2.0', id: 1, method: 'ping' }])).toEqual({
      id: null,
      code: -32600,
      message: 'Invalid request: batch requests are not supported',
    });
  });

  it('should reject non-objects', () => {
    expect(rejection(42)).toEqual({ id: null, code: -32600, message: 'Invalid request: message must be a JSON object' });
    expect(rejection(null)).toEqual({ id: null, code: -32600, message: 'Invalid request: message must be a JSON object' });
  });

  it('should reject a wrong jsonrpc version and keep the id', () => {
    expect(rejection({ jsonrpc: '1.0', id: 3, method: 'ping' })).toEqual({
      id: 3,
      code: -32600,
      message: 'Invalid request: jsonrpc must be "2.0"',
    });
  });

  it('should reject a missing method', () => {
    expect(rejection({ jsonrpc: '2.0', id: 'a' })).toEqual({
      id: 'a',
      code: -32600,
      message: 'Invalid request: method must be a string',
    });
  });

  it('should reject ids that are not string, integer or null', () => {
    expect(rejection({ jsonrpc: '2.0', id: 1.5, method: 'ping' })).toEqual({
      id: null,
      code: -32600,
      message: 'Invalid request: id must be a string, integer or null',
    });
    expect(rejection({ jsonrpc: '2.0', id: { n: 1 }, method: 'ping' })).toEqual({
      id: null,
      code: -32600,
      message: 'Invalid request: id must be a string, integer or null',
    });
  });

  it('should mark a rejected message without an id as a notification', () => {
    const withoutId = validateEnvelope({ jsonrpc: '1.0', method: 'notifications/initialized' });
    const withId = validateEnvelope({ jsonrpc: '1.0', id: 2, method: 'ping' });
    const nonObject = validateEnvelope('ping');
    expect(withoutId.ok === false && withoutId.notification).toBe(true);
    expect(withId.ok === false && withId.notification).toBe(false);
    expect(nonObject.ok === false && nonObject.notification).toBe(false);
  });

  it('should reject scalar params', () => {
    expect(rejection({ jsonrpc: '2.0', id: 4, method: 'ping', params: 'x' })).toEqual({
      id: 4,
      code: -32600,
      message: 'Invalid request: params must be an object or array',
    });
  });
});
