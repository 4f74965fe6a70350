/**
 * @tether/core/node
 *
 * Node.js-only exports: the stdio transport, env file loading and the
 * session token gate.
 *
 * @example
 * ```typescript
 * import { StdioTransport, loadEnvFile, verifySessionToken } from '@tether/core/node';
 * ```
 *
 * @packageDocumentation
 */

export { StdioTransport, type StdioTransportOptions } from './transport/stdio.js';
export {
  FrameDecoder,
  FrameWriter,
  TransportClosedError,
  encodeFrame,
  DEFAULT_MAX_FRAME_BYTES,
  type FrameEvent,
} from './transport/frame-codec.js';
export { loadEnvFile } from './server/env.js';
export { verifySessionToken } from './auth/session-token.js';
