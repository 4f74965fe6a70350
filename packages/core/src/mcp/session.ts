/**
 * Session state machine
 *
 * uninitialized → initialized → closed. Only a successful initialize moves
 * the session forward; stream end or a failed write closes it.
 *
 * @internal
 */

import type { PeerInfo } from '../types/public-api.js';
import type { ClientCapabilities } from './types.js';
import { invalidRequest } from './errors.js';

export type SessionState =
  | { status: 'uninitialized' }
  | {
      status: 'initialized';
      protocolVersion: string;
      peer: Readonly<PeerInfo>;
      clientCapabilities: Readonly<ClientCapabilities>;
      /** Set once the client sends notifications/initialized */
      clientReady: boolean;
    }
  | { status: 'closed' };

export type SessionStatus = SessionState['status'];

export interface Handshake {
  protocolVersion: string;
  peer: PeerInfo;
  clientCapabilities: ClientCapabilities;
}

export class Session {
  private state: SessionState = { status: 'uninitialized' };

  get status(): SessionStatus {
    return this.state.status;
  }

  /**
   * Current state snapshot
   */
  snapshot(): Readonly<SessionState> {
    return this.state;
  }

  isInitialized(): boolean {
    return this.state.status === 'initialized';
  }

  /**
   * Record a completed handshake
   *
   * @throws ProtocolError (InvalidRequest) unless the session is uninitialized
   */
  initialize(handshake: Handshake): void {
    this.assertCanInitialize();
    this.state = {
      status: 'initialized',
      protocolVersion: handshake.protocolVersion,
      peer: Object.freeze({ ...handshake.peer }),
      clientCapabilities: Object.freeze({ ...handshake.clientCapabilities }),
      clientReady: false,
    };
  }

  /**
   * @throws ProtocolError (InvalidRequest) unless the session is uninitialized
   */
  assertCanInitialize(): void {
    if (this.state.status === 'initialized') {
      throw invalidRequest('session is already initialized');
    }
    if (this.state.status === 'closed') {
      throw invalidRequest('session is closed');
    }
  }

  /**
   * Client acknowledged the initialize result
   *
   * @returns false when there is no initialized session to acknowledge
   */
  markClientReady(): boolean {
    if (this.state.status !== 'initialized') {
      return false;
    }
    this.state = { ...this.state, clientReady: true };
    return true;
  }

  close(): void {
    this.state = { status: 'closed' };
  }
}
