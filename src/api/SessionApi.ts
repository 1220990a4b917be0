// src/api/SessionApi.ts

import { BaseApi } from './BaseApi';
import { FlagSchema, SessionSchema, TokenRenewalSchema, type Session, type TokenRenewal } from './schemas';
import { API_VERSION } from '../core/auth/Credentials';
import { buildPath, resolveEndpoint } from '../core/endpoints/EndpointRegistry';

export class SessionApi extends BaseApi {
  /**
   * Browser login URL; the redirect back carries a `request_token`.
   * Opened by the user's browser, so it is never dispatched.
   */
  loginUrl(): string {
    const url = new URL(buildPath(resolveEndpoint('loginUrl')), this.deps.loginBaseUrl);
    url.searchParams.set('api_key', this.deps.credentials.apiKey);
    url.searchParams.set('v', API_VERSION);
    return url.toString();
  }

  /**
   * Exchange a login `request_token` for a session and start using its
   * access token.
   *
   * @param requestToken - Token from the login redirect
   * @param apiSecret - App secret, only used to sign the checksum
   */
  async generateSession(requestToken: string, apiSecret: string): Promise<Session> {
    const apiKey = this.deps.credentials.apiKey;
    const checksum = await this.deps.hasher.sha256Hex(apiKey + requestToken + apiSecret);

    const session = await this.callFor(SessionSchema, 'generateSession', {
      body: { api_key: apiKey, request_token: requestToken, checksum },
    });

    this.deps.credentials.setAccessToken(session.access_token);
    this.deps.logger.info('Session generated', { userId: session.user_id });
    return session;
  }

  async renewAccessToken(refreshToken: string, apiSecret: string): Promise<TokenRenewal> {
    const apiKey = this.deps.credentials.apiKey;
    const checksum = await this.deps.hasher.sha256Hex(apiKey + refreshToken + apiSecret);

    const renewal = await this.callFor(TokenRenewalSchema, 'renewAccessToken', {
      body: { api_key: apiKey, refresh_token: refreshToken, checksum },
    });

    this.deps.credentials.setAccessToken(renewal.access_token);
    this.deps.logger.info('Access token renewed');
    return renewal;
  }

  /**
   * Log out. Defaults to the token currently in use, which is then cleared.
   */
  async invalidateAccessToken(accessToken?: string): Promise<boolean> {
    const token = accessToken ?? this.deps.credentials.accessToken;

    const result = await this.callFor(FlagSchema, 'invalidateSession', {
      query: { api_key: this.deps.credentials.apiKey, access_token: token },
    });

    if (token === this.deps.credentials.accessToken) {
      this.deps.credentials.setAccessToken(undefined);
    }
    return result;
  }

  async invalidateRefreshToken(refreshToken: string): Promise<boolean> {
    return this.callFor(FlagSchema, 'invalidateRefreshToken', {
      query: { api_key: this.deps.credentials.apiKey, refresh_token: refreshToken },
    });
  }

  async profile(): Promise<unknown> {
    return this.call('profile');
  }

  /**
   * Funds and margins, for every segment or just `equity` / `commodity`
   */
  async margins(segment?: 'equity' | 'commodity'): Promise<unknown> {
    if (segment) {
      return this.call('marginsSegment', { segments: [segment] });
    }
    return this.call('margins');
  }
}
