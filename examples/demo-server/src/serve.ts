import { configFromEnv } from '@tether/core';
import { loadEnvFile, verifySessionToken } from '@tether/core/node';
import { createDemoServer } from './index.js';

const envVars = { ...loadEnvFile(), ...process.env };

const server = createDemoServer({ overrides: configFromEnv(envVars) });

const expected = server.config.auth.sessionToken;
if (expected !== undefined && !(await verifySessionToken(expected, envVars['TETHER_CLIENT_TOKEN']))) {
  server.logger.error('Session token rejected; set TETHER_CLIENT_TOKEN to the configured token');
  process.exit(1);
}

try {
  await server.serveStdio();
} catch (error) {
  server.logger.error('Server stopped', { error: error instanceof Error ? error.message : String(error) });
  process.exitCode = 1;
}
