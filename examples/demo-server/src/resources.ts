import { readFile } from 'node:fs/promises';
import { extname, isAbsolute, relative, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import {
  DomainError,
  type HandlerContext,
  type ResourceContent,
  type TetherResource,
  type TetherResourceTemplate,
} from '@tether/core';
import { config } from './config.js';

/** Bundled data files served under `file:///data/` */
export const DEFAULT_DATA_DIR = fileURLToPath(new URL('../data/', import.meta.url));

const MIME_TYPES: Record<string, string> = {
  '.txt': 'text/plain',
  '.json': 'application/json',
};

export function mimeTypeFor(filename: string): string {
  return MIME_TYPES[extname(filename).toLowerCase()] ?? 'application/octet-stream';
}

export const appConfigResource: TetherResource = {
  uri: 'config://app',
  name: 'Application configuration',
  description: 'Name, version, environment and enabled features of this server',
  mimeType: 'application/json',
  handler: async (ctx: HandlerContext): Promise<ResourceContent> => {
    ctx.logger.debug('Reading config resource');

    const body = {
      appName: config.app.name,
      version: config.app.version,
      environment: process.env['NODE_ENV'] ?? 'development',
      features: {
        tools: true,
        resources: true,
        prompts: true,
      },
    };

    return { uri: 'config://app', mimeType: 'application/json', text: JSON.stringify(body, null, 2) };
  },
};

/**
 * Serve files from a directory as `file:///data/{filename}`
 *
 * A filename that resolves outside the directory is refused with FORBIDDEN.
 */
export function createDataFileTemplate(dataDir: string = DEFAULT_DATA_DIR): TetherResourceTemplate {
  const root = resolve(dataDir);

  return {
    uriTemplate: 'file:///data/{filename}',
    name: 'Data file',
    description: 'A file from the server data directory',
    handler: async (uri, { filename = '' }, ctx): Promise<ResourceContent> => {
      const target = resolve(root, filename);
      const rel = relative(root, target);
      if (rel === '' || rel.startsWith('..') || isAbsolute(rel)) {
        ctx.logger.warn('Refused path outside the data directory', { filename });
        throw new DomainError('FORBIDDEN', 'Access denied: path is outside the data directory');
      }

      let text: string;
      try {
        text = await readFile(target, 'utf-8');
      } catch (error) {
        if (isMissingFile(error)) {
          throw new DomainError('NOT_FOUND', `File not found: ${filename}`, { filename });
        }
        throw error;
      }

      return { uri, mimeType: mimeTypeFor(filename), text };
    },
  };
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && (error.code === 'ENOENT' || error.code === 'EISDIR');
}
