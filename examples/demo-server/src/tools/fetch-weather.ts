import type { TetherTool, ToolResult } from '@tether/core';

/**
 * Simulated forecast; every city gets the same mild afternoon.
 */
export const fetchWeatherTool: TetherTool<{ city: string }> = {
  name: 'fetch-weather',
  description: 'Fetches weather information for a given city.',
  inputSchema: {
    type: 'object',
    properties: {
      city: { type: 'string', description: 'The city name' },
    },
    required: ['city'],
  },
  annotations: {
    title: 'Fetch Weather',
    readOnlyHint: true,
    openWorldHint: true,
  },
  handler: async ({ city }, ctx): Promise<ToolResult> => {
    ctx.logger.debug('Fetching weather', { city });

    const report = {
      city,
      temperature: '72°F',
      condition: 'Partly Cloudy',
      humidity: '65%',
      windSpeed: '10 mph',
    };

    return {
      content: [{ type: 'text', text: `Weather for ${city}:\n${JSON.stringify(report, null, 2)}` }],
    };
  },
};
