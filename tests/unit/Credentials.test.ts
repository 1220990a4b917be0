// tests/unit/Credentials.test.ts

import { describe, it, expect } from 'vitest';
import { Credentials } from '../../src/core/auth/Credentials';
import { NodeHasher, WebCryptoHasher } from '../../src/core/auth/Hasher';
import { TokenException } from '../../src/utils/errors';

describe('Credentials', () => {
  it('should send only the API version on public endpoints', () => {
    const credentials = new Credentials('test-key');

    expect(credentials.headersFor(false)).toEqual({ 'X-Kite-Version': '3' });
  });

  it('should build the token authorization header', () => {
    const credentials = new Credentials('test-key', 'test-token');

    expect(credentials.headersFor(true)).toEqual({
      'X-Kite-Version': '3',
      Authorization: 'token test-key:test-token',
    });
  });

  it('should reject authenticated requests without a token', () => {
    const credentials = new Credentials('test-key');

    expect(() => credentials.headersFor(true)).toThrow(TokenException);
  });

  it('should treat an empty token as unset', () => {
    const credentials = new Credentials('test-key', 'test-token');
    credentials.setAccessToken('');

    expect(credentials.accessToken).toBeUndefined();
  });
});

describe('Hasher', () => {
  const abcDigest = 'ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad';

  it('should hash with node crypto', async () => {
    await expect(new NodeHasher().sha256Hex('abc')).resolves.toBe(abcDigest);
  });

  it('should hash with web crypto', async () => {
    await expect(new WebCryptoHasher().sha256Hex('abc')).resolves.toBe(abcDigest);
  });
});
