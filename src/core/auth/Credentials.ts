// src/core/auth/Credentials.ts

import { TokenException } from '../../utils/errors';

export const API_VERSION = '3';

export class Credentials {
  constructor(
    readonly apiKey: string,
    private token?: string
  ) {}

  get accessToken(): string | undefined {
    return this.token;
  }

  setAccessToken(accessToken: string | undefined): void {
    this.token = accessToken || undefined;
  }

  /**
   * Headers for an endpoint. Authenticated endpoints require an access token.
   */
  headersFor(requiresAuth: boolean): Record<string, string> {
    const headers: Record<string, string> = { 'X-Kite-Version': API_VERSION };

    if (requiresAuth) {
      if (!this.token) {
        throw new TokenException('Access token not set; generate a session first');
      }
      headers['Authorization'] = `token ${this.apiKey}:${this.token}`;
    }

    return headers;
  }
}
