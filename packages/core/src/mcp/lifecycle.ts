/**
 * MCP lifecycle handlers (initialize/initialized)
 * @internal
 */

import type { JsonRpcParams, InitializeResult, ServerCapabilities } from './types.js';
import type { Session } from './session.js';
import type { CapabilityRegistries } from './registry.js';
import { initializeParamsSchema, parseParams } from './params.js';

/**
 * Protocol versions this server speaks, newest first
 */
export const SUPPORTED_PROTOCOL_VERSIONS = ['2025-06-18', '2025-03-26', '2024-11-05'] as const;

/**
 * MCP Protocol version offered when the client asks for one we don't know
 */
export const PROTOCOL_VERSION = SUPPORTED_PROTOCOL_VERSIONS[0];

/**
 * Server identity reported in the handshake
 */
export interface ServerIdentity {
  name: string;
  version: string;
  instructions?: string;
}

/**
 * Pick the version to answer with
 *
 * A supported client version is echoed back; anything else gets our latest.
 */
export function negotiateProtocolVersion(requested: string): string {
  return (SUPPORTED_PROTOCOL_VERSIONS as readonly string[]).includes(requested)
    ? requested
    : PROTOCOL_VERSION;
}

/**
 * Build server capabilities based on registered handlers
 */
export function buildCapabilities(registries: CapabilityRegistries): ServerCapabilities {
  const capabilities: ServerCapabilities = {};

  if (registries.tools.size > 0) {
    capabilities.tools = {
      listChanged: false, // Registries are fixed at startup
    };
  }

  if (registries.resources.size > 0 || registries.resourceTemplates.size > 0) {
    capabilities.resources = {
      subscribe: false,
      listChanged: false,
    };
  }

  if (registries.prompts.size > 0) {
    capabilities.prompts = {
      listChanged: false,
    };
  }

  // Always support logging
  capabilities.logging = {};

  return capabilities;
}

/**
 * Handle initialize request
 *
 * Performs MCP protocol handshake and returns server capabilities.
 * The session only changes state when the params are valid.
 */
export function handleInitialize(
  params: JsonRpcParams | undefined,
  session: Session,
  registries: CapabilityRegistries,
  server: ServerIdentity
): InitializeResult {
  session.assertCanInitialize();
  const { protocolVersion, capabilities, clientInfo } = parseParams(initializeParamsSchema, params);
  const negotiated = negotiateProtocolVersion(protocolVersion);

  session.initialize({
    protocolVersion: negotiated,
    peer: { name: clientInfo.name, version: clientInfo.version },
    clientCapabilities: capabilities,
  });

  return {
    protocolVersion: negotiated,
    capabilities: buildCapabilities(registries),
    serverInfo: {
      name: server.name,
      version: server.version,
    },
    ...(server.instructions ? { instructions: server.instructions } : {}),
  };
}

/**
 * Handle initialized notification
 *
 * This is a notification (no response expected) sent by the client
 * after it has processed the initialize response.
 */
export function handleInitialized(session: Session): boolean {
  return session.markClientReady();
}
