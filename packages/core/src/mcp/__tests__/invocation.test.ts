import { describe, it, expect, vi } from 'vitest';
import { Invocation } from '../invocation.js';
import { ProtocolError } from '../errors.js';

const never = () => new Promise<never>(() => undefined);

describe('Invocation', () => {
  it('should resolve with the operation result', async () => {
    const invocation = new Invocation(async () => 'done');
    await expect(invocation.run(1000)).resolves.toBe('done');
    expect(invocation.status).toBe('settled');
  });

  it('should pass operation failures through unchanged', async () => {
    const failure = new Error('handler broke');
    const invocation = new Invocation(async () => {
      throw failure;
    });
    await expect(invocation.run(1000)).rejects.toBe(failure);
  });

  it('should catch synchronous throws', async () => {
    const invocation = new Invocation((): Promise<string> => {
      throw new Error('sync');
    });
    await expect(invocation.run(1000)).rejects.toThrow('sync');
  });

  it('should time out and abort the signal', async () => {
    const seen: { signal?: AbortSignal } = {};
    const invocation = new Invocation(signal => {
      seen.signal = signal;
      return never();
    });
    await expect(invocation.run(10)).rejects.toEqual(new ProtocolError(-32603, 'Request timed out'));
    expect(invocation.status).toBe('timed-out');
    expect(seen.signal?.aborted).toBe(true);
  });

  it('should never start once cancelled before run', async () => {
    const operation = vi.fn(async () => 'ran');
    const invocation = new Invocation(operation);
    invocation.cancel();
    await expect(invocation.run(1000)).rejects.toThrow('Request cancelled');
    expect(operation).not.toHaveBeenCalled();
  });

  it('should stop waiting when cancelled while running', async () => {
    const invocation = new Invocation(() => never());
    const pending = invocation.run(60_000);
    await Promise.resolve();
    invocation.cancel();
    await expect(pending).rejects.toThrow('Request cancelled');
    expect(invocation.signal.aborted).toBe(true);
  });

  it('should ignore a result that arrives after the timeout', async () => {
    let finish: (value: string) => void = () => undefined;
    const invocation = new Invocation(
      () => new Promise<string>(resolve => {
        finish = resolve;
      })
    );
    await expect(invocation.run(10)).rejects.toThrow('Request timed out');
    finish('late');
    expect(invocation.status).toBe('timed-out');
  });
});
