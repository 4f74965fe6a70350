import { describe, it, expect, beforeEach } from 'vitest';
import { Session } from '../session.js';
import { ProtocolError } from '../errors.js';

const handshake = {
  protocolVersion: '2025-06-18',
  peer: { name: 'test-client', version: '1.0.0' },
  clientCapabilities: { roots: { listChanged: true } },
};

describe('Session', () => {
  let session: Session;

  beforeEach(() => {
    session = new Session();
  });

  it('should start uninitialized', () => {
    expect(session.status).toBe('uninitialized');
    expect(session.isInitialized()).toBe(false);
  });

  it('should record the handshake on initialize', () => {
    session.initialize(handshake);
    expect(session.snapshot()).toEqual({
      status: 'initialized',
      protocolVersion: '2025-06-18',
      peer: { name: 'test-client', version: '1.0.0' },
      clientCapabilities: { roots: { listChanged: true } },
      clientReady: false,
    });
  });

  it('should reject a second initialize and keep the first handshake', () => {
    session.initialize(handshake);
    expect(() => session.initialize({ ...handshake, protocolVersion: '2024-11-05' })).toThrowError(
      new ProtocolError(-32600, 'Invalid request: session is already initialized')
    );
    const state = session.snapshot();
    expect(state.status === 'initialized' && state.protocolVersion).toBe('2025-06-18');
  });

  it('should mark the client ready only once initialized', () => {
    expect(session.markClientReady()).toBe(false);
    session.initialize(handshake);
    expect(session.markClientReady()).toBe(true);
    const state = session.snapshot();
    expect(state.status === 'initialized' && state.clientReady).toBe(true);
  });

  it('should refuse to initialize after close', () => {
    session.close();
    expect(session.status).toBe('closed');
    expect(() => session.initialize(handshake)).toThrow('Invalid request: session is closed');
  });
});
