/**
 * Server configuration
 *
 * A `TetherConfig` literal supplies identity; the environment may override
 * the runtime knobs. `resolveConfig()` validates the result and fills in
 * defaults, so everything downstream reads a complete config.
 *
 * @internal
 */

import { z } from 'zod';
import type { TetherConfig } from '../types/public-api.js';
import { LOG_LEVELS } from '../utils/logger.js';
import { DEFAULT_MAX_FRAME_BYTES } from '../transport/frame-codec.js';
import { DEFAULT_HANDLER_TIMEOUT_MS } from '../mcp/dispatcher.js';

const configSchema = z.object({
  app: z.object({
    name: z.string().min(1, 'app.name is required'),
    description: z.string().default(''),
    version: z.string().min(1, 'app.version is required'),
  }),
  mcp: z.object({
    serverName: z.string().min(1, 'mcp.serverName is required'),
    instructions: z.string().optional(),
  }),
  transport: z
    .object({ maxFrameBytes: z.number().int().positive().default(DEFAULT_MAX_FRAME_BYTES) })
    .default({}),
  dispatch: z
    .object({ handlerTimeoutMs: z.number().int().positive().default(DEFAULT_HANDLER_TIMEOUT_MS) })
    .default({}),
  auth: z.object({ sessionToken: z.string().min(1).optional() }).default({}),
  logging: z.object({ level: z.enum(LOG_LEVELS).default('info') }).default({}),
});

/**
 * Config with every default applied
 */
export type ResolvedConfig = z.output<typeof configSchema>;

/**
 * Sections the environment may override
 */
export type ConfigOverrides = Pick<TetherConfig, 'transport' | 'dispatch' | 'auth' | 'logging'>;

const envSchema = z.object({
  TETHER_LOG_LEVEL: z.enum(LOG_LEVELS).optional(),
  TETHER_MAX_FRAME_BYTES: z.coerce.number().int().positive().optional(),
  TETHER_HANDLER_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
  TETHER_SESSION_TOKEN: z.string().optional(),
});

/**
 * Invalid configuration; `issues` lists each problem as `path: message`
 */
export class ConfigError extends Error {
  override readonly name = 'ConfigError';

  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
  }
}

/**
 * Validate a config and apply defaults
 *
 * @throws ConfigError
 */
export function resolveConfig(config: TetherConfig, overrides: ConfigOverrides = {}): ResolvedConfig {
  const merged = {
    ...config,
    transport: { ...config.transport, ...overrides.transport },
    dispatch: { ...config.dispatch, ...overrides.dispatch },
    auth: { ...config.auth, ...overrides.auth },
    logging: { ...config.logging, ...overrides.logging },
  };

  const result = configSchema.safeParse(merged);
  if (!result.success) {
    throw new ConfigError(formatIssues(result.error));
  }
  return result.data;
}

/**
 * Read overrides from environment variables
 *
 * Unset and empty variables are ignored.
 *
 * @throws ConfigError when a variable is set to an unusable value
 */
export function configFromEnv(env: Record<string, string | undefined>): ConfigOverrides {
  const present: Record<string, string> = {};
  for (const key of Object.keys(envSchema.shape)) {
    const value = env[key]?.trim();
    if (value) {
      present[key] = value;
    }
  }

  const result = envSchema.safeParse(present);
  if (!result.success) {
    throw new ConfigError(formatIssues(result.error));
  }

  const vars = result.data;
  const overrides: ConfigOverrides = {};
  if (vars.TETHER_MAX_FRAME_BYTES !== undefined) {
    overrides.transport = { maxFrameBytes: vars.TETHER_MAX_FRAME_BYTES };
  }
  if (vars.TETHER_HANDLER_TIMEOUT_MS !== undefined) {
    overrides.dispatch = { handlerTimeoutMs: vars.TETHER_HANDLER_TIMEOUT_MS };
  }
  if (vars.TETHER_SESSION_TOKEN !== undefined) {
    overrides.auth = { sessionToken: vars.TETHER_SESSION_TOKEN };
  }
  if (vars.TETHER_LOG_LEVEL !== undefined) {
    overrides.logging = { level: vars.TETHER_LOG_LEVEL };
  }
  return overrides;
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map(issue =>
    issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
  );
}
