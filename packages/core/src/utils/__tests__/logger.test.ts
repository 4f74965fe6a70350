import { describe, it, expect } from 'vitest';
import { PassThrough } from 'node:stream';
import { createLogger, formatLine, streamSink } from '../logger.js';

const fixedClock = () => new Date('2026-01-01T00:00:00.000Z');

function capture() {
  const lines: string[] = [];
  const logger = createLogger({ name: 'tether', sink: line => lines.push(line), now: fixedClock });
  return { lines, logger };
}

describe('formatLine', () => {
  it('should format without context', () => {
    expect(formatLine(fixedClock(), 'info', 'tether', 'Serving')).toBe(
      '[tether] 2026-01-01T00:00:00.000Z info tether: Serving'
    );
  });

  it('should append context as JSON', () => {
    expect(formatLine(fixedClock(), 'warning', 'tether:transport', 'Dropped', { bytes: 12 })).toBe(
      '[tether] 2026-01-01T00:00:00.000Z warning tether:transport: Dropped {"bytes":12}'
    );
  });

  it('should leave out an empty context', () => {
    expect(formatLine(fixedClock(), 'debug', 'x', 'm', {})).toBe('[tether] 2026-01-01T00:00:00.000Z debug x: m');
  });

  it('should serialize errors by name and message', () => {
    const error = new Error('boom');
    error.stack = 'stack';
    expect(formatLine(fixedClock(), 'error', 'x', 'Failed', { error })).toBe(
      '[tether] 2026-01-01T00:00:00.000Z error x: Failed {"error":{"name":"Error","message":"boom","stack":"stack"}}'
    );
  });
});

describe('createLogger', () => {
  it('should drop messages below the level', () => {
    const { lines, logger } = capture();
    logger.debug('hidden');
    logger.info('shown');
    expect(lines).toEqual(['[tether] 2026-01-01T00:00:00.000Z info tether: shown']);
  });

  it('should write warn at the warning level', () => {
    const { lines, logger } = capture();
    logger.warn('careful');
    expect(lines).toEqual(['[tether] 2026-01-01T00:00:00.000Z warning tether: careful']);
  });

  it('should share the level between parent and children', () => {
    const { lines, logger } = capture();
    const child = logger.child('dispatcher');
    child.setLevel('debug');
    expect(logger.getLevel()).toBe('debug');
    logger.debug('from parent');
    child.debug('from child');
    expect(lines).toEqual([
      '[tether] 2026-01-01T00:00:00.000Z debug tether: from parent',
      '[tether] 2026-01-01T00:00:00.000Z debug tether:dispatcher: from child',
    ]);
  });

  it('should swallow sink failures', () => {
    const logger = createLogger({
      sink: () => {
        throw new Error('stderr closed');
      },
    });
    expect(() => logger.error('still fine')).not.toThrow();
  });
});

describe('streamSink', () => {
  it('should write one line per entry', () => {
    const stream = new PassThrough();
    const chunks: string[] = [];
    stream.on('data', (chunk: Buffer) => chunks.push(chunk.toString('utf8')));

    const logger = createLogger({ sink: streamSink(stream), now: fixedClock });
    logger.info('Serving', { tools: 3 });
    expect(chunks.join('')).toBe('[tether] 2026-01-01T00:00:00.000Z info tether: Serving {"tools":3}\n');
  });

  it('should absorb asynchronous stream errors', () => {
    const stream = new PassThrough();
    const logger = createLogger({ sink: streamSink(stream) });
    logger.info('before the pipe closes');
    expect(() => stream.emit('error', new Error('write EPIPE'))).not.toThrow();
    expect(() => logger.info('after the pipe closed')).not.toThrow();
  });

  it('should guard a stream only once', () => {
    const stream = new PassThrough();
    streamSink(stream);
    streamSink(stream);
    expect(stream.listenerCount('error')).toBe(1);
  });
});
