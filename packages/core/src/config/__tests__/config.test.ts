import { describe, it, expect } from 'vitest';
import { ConfigError, configFromEnv, resolveConfig } from '../config.js';
import type { TetherConfig } from '../../types/public-api.js';

const baseConfig: TetherConfig = {
  app: { name: 'Demo', description: 'Demo server', version: '1.2.3' },
  mcp: { serverName: 'demo-server' },
};

describe('resolveConfig', () => {
  it('should apply defaults', () => {
    expect(resolveConfig(baseConfig)).toEqual({
      app: { name: 'Demo', description: 'Demo server', version: '1.2.3' },
      mcp: { serverName: 'demo-server' },
      transport: { maxFrameBytes: 4 * 1024 * 1024 },
      dispatch: { handlerTimeoutMs: 30_000 },
      auth: {},
      logging: { level: 'info' },
    });
  });

  it('should keep explicit values', () => {
    const resolved = resolveConfig({
      ...baseConfig,
      transport: { maxFrameBytes: 1024 },
      dispatch: { handlerTimeoutMs: 500 },
      logging: { level: 'debug' },
    });
    expect(resolved.transport.maxFrameBytes).toBe(1024);
    expect(resolved.dispatch.handlerTimeoutMs).toBe(500);
    expect(resolved.logging.level).toBe('debug');
  });

  it('should let overrides win over the config', () => {
    const resolved = resolveConfig(
      { ...baseConfig, logging: { level: 'debug' } },
      { logging: { level: 'error' }, auth: { sessionToken: 'test-secret' } }
    );
    expect(resolved.logging.level).toBe('error');
    expect(resolved.auth.sessionToken).toBe('test-secret');
  });

  it('should list every problem', () => {
    expect(() =>
      resolveConfig({
        app: { name: '', description: '', version: '1.0.0' },
        mcp: { serverName: 'demo' },
        dispatch: { handlerTimeoutMs: -1 },
      })
    ).toThrowError(
      new ConfigError([
        'app.name: app.name is required',
        'dispatch.handlerTimeoutMs: Number must be greater than 0',
      ])
    );
  });

  it('should expose the issues on the error', () => {
    try {
      resolveConfig({ ...baseConfig, mcp: { serverName: '' } });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError);
      expect(error instanceof ConfigError && error.issues).toEqual(['mcp.serverName: mcp.serverName is required']);
    }
  });
});

describe('configFromEnv', () => {
  it('should read the known variables', () => {
    expect(
      configFromEnv({
        TETHER_LOG_LEVEL: 'debug',
        TETHER_MAX_FRAME_BYTES: '2048',
        TETHER_HANDLER_TIMEOUT_MS: '1500',
        TETHER_SESSION_TOKEN: 'test-secret',
        UNRELATED: 'ignored',
      })
    ).toEqual({
      logging: { level: 'debug' },
      transport: { maxFrameBytes: 2048 },
      dispatch: { handlerTimeoutMs: 1500 },
      auth: { sessionToken: 'test-secret' },
    });
  });

  it('should ignore unset and empty variables', () => {
    expect(configFromEnv({ TETHER_LOG_LEVEL: '', TETHER_MAX_FRAME_BYTES: '  ' })).toEqual({});
  });

  it('should reject unusable values', () => {
    expect(() => configFromEnv({ TETHER_MAX_FRAME_BYTES: 'lots' })).toThrow(ConfigError);
    expect(() => configFromEnv({ TETHER_LOG_LEVEL: 'verbose' })).toThrow(ConfigError);
  });
});
