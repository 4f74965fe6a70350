import { createSilentLogger, type HandlerContext } from '@tether/core';

export function makeCtx(overrides: Partial<HandlerContext> = {}): HandlerContext {
  return {
    requestId: 'req-1',
    signal: new AbortController().signal,
    logger: createSilentLogger(),
    peer: { name: 'test-client', version: '1.0.0' },
    ...overrides,
  };
}
