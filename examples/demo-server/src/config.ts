import type { TetherConfig } from '@tether/core';

export const config: TetherConfig = {
  app: {
    name: 'Tether Demo',
    description: 'Greeting, BMI and weather tools with a config resource, data files and a code-review prompt',
    version: '0.1.0',
  },
  mcp: {
    serverName: 'tether-demo',
    instructions: 'Use fetch-weather for forecasts and read file:///data/{filename} for the bundled notes.',
  },
  dispatch: {
    handlerTimeoutMs: 10_000,
  },
  logging: {
    level: 'info',
  },
};
