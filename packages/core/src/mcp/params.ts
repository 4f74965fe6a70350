/**
 * Params schemas for each MCP method
 * @internal
 */

import { z } from 'zod';
import { LOG_LEVELS } from '../utils/logger.js';
import { invalidParams } from './errors.js';
import type { JsonRpcParams } from './types.js';

const metaSchema = z.object({ progressToken: z.union([z.string(), z.number()]).optional() }).passthrough();

export const initializeParamsSchema = z.object({
  protocolVersion: z.string().min(1, 'protocolVersion is required'),
  capabilities: z
    .object({
      roots: z.object({ listChanged: z.boolean().optional() }).passthrough().optional(),
      sampling: z.record(z.unknown()).optional(),
      elicitation: z.record(z.unknown()).optional(),
      experimental: z.record(z.unknown()).optional(),
    })
    .passthrough()
    .default({}),
  clientInfo: z.object({
    name: z.string().min(1, 'clientInfo.name is required'),
    version: z.string().default(''),
  }),
});

export const listParamsSchema = z.object({
  cursor: z.string().optional(),
  _meta: metaSchema.optional(),
});

export const toolsCallParamsSchema = z.object({
  name: z.string().min(1, 'name is required'),
  arguments: z.record(z.unknown()).default({}),
  _meta: metaSchema.optional(),
});

export const resourcesReadParamsSchema = z.object({
  uri: z.string().min(1, 'uri is required'),
  _meta: metaSchema.optional(),
});

export const promptsGetParamsSchema = z.object({
  name: z.string().min(1, 'name is required'),
  arguments: z.record(z.unknown()).default({}),
  _meta: metaSchema.optional(),
});

export const setLevelParamsSchema = z.object({
  level: z.enum(LOG_LEVELS),
});

export const cancelledParamsSchema = z.object({
  requestId: z.union([z.string(), z.number()]),
  reason: z.string().optional(),
});

export type InitializeParamsInput = z.infer<typeof initializeParamsSchema>;
export type ToolsCallParams = z.infer<typeof toolsCallParamsSchema>;
export type ResourcesReadParams = z.infer<typeof resourcesReadParamsSchema>;
export type PromptsGetParams = z.infer<typeof promptsGetParamsSchema>;
export type CancelledParams = z.infer<typeof cancelledParamsSchema>;

/**
 * Parse params or throw InvalidParams listing the issues
 *
 * Absent params are treated as `{}`; by-position arrays never match.
 */
export function parseParams<T extends z.ZodTypeAny>(
  schema: T,
  params: JsonRpcParams | undefined
): z.output<T> {
  const result = schema.safeParse(params ?? {});
  if (!result.success) {
    throw invalidParams(
      result.error.issues.map(issue => ({
        path: issue.path.join('.'),
        message: issue.message,
      }))
    );
  }
  return result.data;
}
