/**
 * Env file loading for local runs
 *
 * @internal
 */

import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';

/**
 * Load environment variables from `.dev.vars` then `.env` files.
 * Later files do NOT override earlier ones (`.dev.vars` takes priority).
 * Returns a flat record of key-value pairs.
 *
 * @example
 * ```typescript
 * const env = { ...loadEnvFile(), ...process.env };
 * ```
 */
export function loadEnvFile(...paths: string[]): Record<string, string> {
  const defaultPaths = paths.length > 0 ? paths : ['.dev.vars', '.env'];
  const env: Record<string, string> = {};

  for (const p of defaultPaths) {
    const content = readOptional(resolve(p));
    if (content === null) continue;

    for (const [key, value] of parseEnv(content)) {
      // First file wins
      if (!(key in env)) {
        env[key] = value;
      }
    }
  }

  return env;
}

/**
 * Parse `KEY=value` lines; blank lines and `#` comments are skipped
 */
export function parseEnv(content: string): Array<[string, string]> {
  const entries: Array<[string, string]> = [];

  for (const line of content.split('\n')) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith('#')) continue;
    const eqIdx = trimmed.indexOf('=');
    if (eqIdx === -1) continue;
    const key = trimmed.slice(0, eqIdx).trim();
    let value = trimmed.slice(eqIdx + 1).trim();
    // Strip surrounding quotes
    if ((value.startsWith('"') && value.endsWith('"') && value.length >= 2) ||
        (value.startsWith("'") && value.endsWith("'") && value.length >= 2)) {
      value = value.slice(1, -1);
    }
    if (key) {
      entries.push([key, value]);
    }
  }

  return entries;
}

function readOptional(path: string): string | null {
  try {
    return readFileSync(path, 'utf-8');
  } catch (error) {
    if (isMissingFile(error)) {
      return null;
    }
    throw error;
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
