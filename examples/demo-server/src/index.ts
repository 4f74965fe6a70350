import { TetherServer, type ConfigOverrides, type Logger } from '@tether/core';
import { demoTools } from './tools.js';
import { appConfigResource, createDataFileTemplate } from './resources.js';
import { reviewCodePrompt } from './prompts.js';
import { config } from './config.js';

export interface DemoServerOptions {
  overrides?: ConfigOverrides;
  /** Directory behind `file:///data/{filename}` (default: the bundled data/) */
  dataDir?: string;
  logger?: Logger;
}

export function createDemoServer(options: DemoServerOptions = {}): TetherServer {
  return new TetherServer({
    config,
    overrides: options.overrides,
    tools: demoTools,
    resources: [appConfigResource],
    resourceTemplates: [createDataFileTemplate(options.dataDir)],
    prompts: [reviewCodePrompt],
    logger: options.logger,
  });
}

export { demoTools } from './tools.js';
export { appConfigResource, createDataFileTemplate, mimeTypeFor } from './resources.js';
export { reviewCodePrompt } from './prompts.js';
export { config } from './config.js';
