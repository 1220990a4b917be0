// src/core/auth/Hasher.ts

import * as crypto from 'crypto';

/**
 * Keyed-hash capability used for session checksums.
 */
export interface Hasher {
  sha256Hex(input: string): Promise<string>;
}

export class NodeHasher implements Hasher {
  async sha256Hex(input: string): Promise<string> {
    return crypto.createHash('sha256').update(input, 'utf8').digest('hex');
  }
}

/**
 * Web Crypto variant for runtimes without `node:crypto` hashing.
 */
export class WebCryptoHasher implements Hasher {
  constructor(private subtle: crypto.webcrypto.SubtleCrypto = crypto.webcrypto.subtle) {}

  async sha256Hex(input: string): Promise<string> {
    const digest = await this.subtle.digest('SHA-256', new TextEncoder().encode(input));
    return Buffer.from(digest).toString('hex');
  }
}
