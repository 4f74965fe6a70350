/**
 * MCP tools handlers (tools/list, tools/call)
 * @internal
 */

import type { TetherTool } from '../types/public-api.js';
import type {
  JsonRpcParams,
  ToolsListResult,
  ToolsCallResult,
  ToolDefinition,
} from './types.js';
import type { CapabilityRegistry } from './registry.js';
import type { InvokeHandler } from './invocation.js';
import { toolNotFound, invalidParams } from './errors.js';
import { listParamsSchema, parseParams, toolsCallParamsSchema } from './params.js';
import { validateInput } from '../utils/validation.js';

/**
 * Handle tools/list request
 *
 * Returns a list of all registered tools with their schemas.
 */
export function handleToolsList(
  params: JsonRpcParams | undefined,
  tools: CapabilityRegistry<TetherTool>
): ToolsListResult {
  parseParams(listParamsSchema, params);

  const toolDefinitions: ToolDefinition[] = tools.list().map(tool => ({
    name: tool.name,
    description: tool.description,
    inputSchema: tool.inputSchema,
    ...(tool.annotations ? { annotations: tool.annotations } : {}),
  }));

  return { tools: toolDefinitions };
}

/**
 * Handle tools/call request
 *
 * Arguments are checked against the tool's input schema before the handler
 * runs; a mismatch is InvalidParams and the handler is never invoked.
 */
export async function handleToolsCall(
  params: JsonRpcParams | undefined,
  tools: CapabilityRegistry<TetherTool>,
  invoke: InvokeHandler
): Promise<ToolsCallResult> {
  const { name, arguments: input } = parseParams(toolsCallParamsSchema, params);

  const tool = tools.get(name);
  if (!tool) {
    throw toolNotFound(name);
  }

  const validationResult = validateInput(input, tool.inputSchema);
  if (!validationResult.valid) {
    throw invalidParams(validationResult.errors);
  }

  const result = await invoke(`tool:${tool.name}`, ctx => tool.handler(input, ctx));

  return {
    content: result.content,
    isError: result.isError ?? false,
  };
}
