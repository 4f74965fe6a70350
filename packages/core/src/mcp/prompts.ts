/**
 * MCP prompts handlers (prompts/list, prompts/get)
 * @internal
 */

import type { TetherPrompt } from '../types/public-api.js';
import type { JsonRpcParams, PromptsListResult, PromptsGetResult } from './types.js';
import type { CapabilityRegistry } from './registry.js';
import type { InvokeHandler } from './invocation.js';
import { promptNotFound, invalidParams } from './errors.js';
import { listParamsSchema, parseParams, promptsGetParamsSchema } from './params.js';
import { validatePromptArguments } from '../utils/validation.js';

/**
 * Handle prompts/list request
 */
export function handlePromptsList(
  params: JsonRpcParams | undefined,
  prompts: CapabilityRegistry<TetherPrompt>
): PromptsListResult {
  parseParams(listParamsSchema, params);

  return {
    prompts: prompts.list().map(prompt => ({
      name: prompt.name,
      description: prompt.description,
      arguments: prompt.arguments,
    })),
  };
}

/**
 * Handle prompts/get request
 *
 * Gets a specific prompt with arguments filled in.
 */
export async function handlePromptsGet(
  params: JsonRpcParams | undefined,
  prompts: CapabilityRegistry<TetherPrompt>,
  invoke: InvokeHandler
): Promise<PromptsGetResult> {
  const { name, arguments: args } = parseParams(promptsGetParamsSchema, params);

  const prompt = prompts.get(name);
  if (!prompt) {
    throw promptNotFound(name);
  }

  const validationResult = validatePromptArguments(args, prompt.arguments);
  if (!validationResult.valid) {
    throw invalidParams(validationResult.errors);
  }

  const values: Record<string, string> = {};
  for (const [key, value] of Object.entries(args)) {
    if (typeof value === 'string') {
      values[key] = value;
    }
  }

  const messages = await invoke(`prompt:${prompt.name}`, ctx => prompt.handler(values, ctx));

  return {
    description: prompt.description,
    messages,
  };
}
