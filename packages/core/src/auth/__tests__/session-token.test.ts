import { describe, it, expect } from 'vitest';
import { constantTimeEqual, hashTokenAsync, verifySessionToken } from '../session-token.js';

describe('hashTokenAsync', () => {
  it('should return the hex SHA-256 digest', async () => {
    expect(await hashTokenAsync('')).toBe('e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855');
  });

  it('should produce different hashes for different tokens', async () => {
    expect(await hashTokenAsync('token-one')).not.toBe(await hashTokenAsync('token-two'));
  });
});

describe('constantTimeEqual', () => {
  it('should compare strings', () => {
    expect(constantTimeEqual('abc', 'abc')).toBe(true);
    expect(constantTimeEqual('abc', 'abd')).toBe(false);
    expect(constantTimeEqual('abc', 'abcd')).toBe(false);
  });
});

describe('verifySessionToken', () => {
  it('should accept the matching token', async () => {
    expect(await verifySessionToken('test-secret', 'test-secret')).toBe(true);
  });

  it('should reject a different token', async () => {
    expect(await verifySessionToken('test-secret', 'test-secret-2')).toBe(false);
  });

  it('should reject a missing or empty token', async () => {
    expect(await verifySessionToken('test-secret', undefined)).toBe(false);
    expect(await verifySessionToken('test-secret', '')).toBe(false);
  });
});
