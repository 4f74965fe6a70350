import type { TetherTool, ToolResult } from '@tether/core';

export const greetTool: TetherTool<{ name: string }> = {
  name: 'greet',
  description: 'Greets a person by name.',
  inputSchema: {
    type: 'object',
    properties: {
      name: { type: 'string', description: 'Name of the person to greet' },
    },
    required: ['name'],
  },
  annotations: {
    title: 'Greeting',
    readOnlyHint: true,
    openWorldHint: false,
  },
  handler: async ({ name }, ctx): Promise<ToolResult> => {
    ctx.logger.debug('Greeting', { name });
    return { content: [{ type: 'text', text: `Hello, ${name}! Welcome to MCP.` }] };
  },
};
