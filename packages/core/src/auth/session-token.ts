/**
 * Out-of-band session token check
 *
 * The launcher may hand the server a shared token (environment variable)
 * that the client must present before the stream is served. Tokens are
 * compared as SHA-256 digests so the comparison time does not depend on
 * where the inputs differ.
 *
 * @internal
 */

/**
 * Hash a token using SHA-256
 *
 * @returns Hex-encoded SHA-256 hash
 */
export async function hashTokenAsync(token: string): Promise<string> {
  const data = new TextEncoder().encode(token);
  const hashBuffer = await crypto.subtle.digest('SHA-256', data);

  return Array.from(new Uint8Array(hashBuffer))
    .map(b => b.toString(16).padStart(2, '0'))
    .join('');
}

/**
 * Compare two strings in constant time (for equal lengths)
 */
export function constantTimeEqual(a: string, b: string): boolean {
  if (a.length !== b.length) {
    return false;
  }

  let result = 0;
  for (let i = 0; i < a.length; i++) {
    result |= a.charCodeAt(i) ^ b.charCodeAt(i);
  }

  return result === 0;
}

/**
 * Check a presented token against the configured one
 *
 * A missing presented token never matches.
 *
 * @example
 * ```typescript
 * if (!(await verifySessionToken(config.auth.sessionToken, process.env.TETHER_CLIENT_TOKEN))) {
 *   process.exit(1);
 * }
 * ```
 */
export async function verifySessionToken(expected: string, provided: string | undefined): Promise<boolean> {
  if (provided === undefined || provided.length === 0) {
    return false;
  }
  const [expectedHash, providedHash] = await Promise.all([
    hashTokenAsync(expected),
    hashTokenAsync(provided),
  ]);
  return constantTimeEqual(expectedHash, providedHash);
}
