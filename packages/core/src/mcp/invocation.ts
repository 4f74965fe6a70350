/**
 * Bounded handler invocation
 *
 * An invocation can be cancelled before it starts (it then never starts),
 * and once started it is awaited for at most `timeoutMs`. Expiry or a
 * cancellation aborts the handler's signal and ends the wait; the handler
 * itself is never forcibly interrupted.
 *
 * @internal
 */

import type { HandlerContext } from '../types/public-api.js';
import { internalError } from './errors.js';

/**
 * Runs a capability handler under the dispatcher's invocation policy
 *
 * `scope` names the capability for the handler's logger.
 */
export type InvokeHandler = <T>(
  scope: string,
  operation: (ctx: HandlerContext) => Promise<T>
) => Promise<T>;

export type InvocationStatus = 'pending' | 'running' | 'settled' | 'timed-out' | 'cancelled';

export class Invocation<T> {
  private readonly controller = new AbortController();
  private state: InvocationStatus = 'pending';
  private interrupt: ((reason: 'timeout' | 'cancelled') => void) | null = null;

  constructor(private readonly operation: (signal: AbortSignal) => Promise<T>) {}

  get status(): InvocationStatus {
    return this.state;
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  /**
   * Cancel the invocation
   *
   * Before `run()` this prevents the operation from ever starting. While
   * running it ends the wait early; the operation keeps running until it
   * notices the aborted signal, and its outcome is discarded.
   */
  cancel(): void {
    if (this.state === 'pending') {
      this.state = 'cancelled';
      this.controller.abort();
      return;
    }
    this.interrupt?.('cancelled');
  }

  /**
   * Start the operation and wait for it
   *
   * @throws ProtocolError (InternalError) on timeout or cancellation
   */
  run(timeoutMs: number): Promise<T> {
    if (this.state === 'cancelled') {
      return Promise.reject(internalError('cancelled'));
    }
    if (this.state !== 'pending') {
      return Promise.reject(new Error('Invocation already started'));
    }
    this.state = 'running';

    return new Promise<T>((resolve, reject) => {
      const timer = setTimeout(() => this.interrupt?.('timeout'), timeoutMs);

      this.interrupt = (reason) => {
        if (this.state !== 'running') return;
        clearTimeout(timer);
        this.state = reason === 'timeout' ? 'timed-out' : 'cancelled';
        this.controller.abort();
        reject(internalError(reason));
      };

      Promise.resolve()
        .then(() => this.operation(this.controller.signal))
        .then(
          (value) => {
            if (this.state !== 'running') return;
            clearTimeout(timer);
            this.state = 'settled';
            resolve(value);
          },
          (error: unknown) => {
            if (this.state !== 'running') return;
            clearTimeout(timer);
            this.state = 'settled';
            reject(error);
          }
        );
    });
  }
}
