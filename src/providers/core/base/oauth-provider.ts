/**
 * Base OAuth Provider
 *
 * Token caching and refresh shared by the authorization code, client
 * credentials and device flow providers. Concurrent requests that find the
 * token stale wait on one shared acquisition instead of each starting one.
 */

import { z } from 'zod';
import type { AuthProvider, ProviderCredentials } from '../types.js';
import type { AuthMethod, OutgoingRequest, Params, TransportClient } from '../../../proxy/types.js';
import { AuthPreparationError } from '../../../proxy/errors.js';
import { logger } from '../../../utils/logger.js';
import { getErrorMessage } from '../../../utils/errors.js';
import { HTTPClient } from './http-client.js';
import type { HTTPResponse } from './http-client.js';
import { aadEndpoint } from './aad-endpoints.js';

// Refresh this long before the token actually expires
const EXPIRY_SKEW_MS = 60_000;

export const TokenResponseSchema = z.object({
  access_token: z.string().min(1),
  token_type: z.string().default('Bearer'),
  expires_in: z.coerce.number().optional(),
  refresh_token: z.string().optional()
});

export const OAuthErrorSchema = z.object({
  error: z.string(),
  error_description: z.string().optional()
});

export interface OAuthToken {
  accessToken: string;
  tokenType: string;
  refreshToken?: string;
  /** epoch millis; undefined when the server gave no lifetime */
  expiresAt?: number;
}

export interface OAuthSettings {
  clientId: string;
  clientSecret?: string;
  tenantId: string;
  authority: string;
  scopes: string[];
}

export function oauthSettings(credentials: ProviderCredentials): OAuthSettings {
  return {
    clientId: credentials.clientId ?? '',
    clientSecret: credentials.clientSecret,
    tenantId: credentials.tenantId ?? '',
    authority: credentials.authority,
    scopes: credentials.scopes
  };
}

export abstract class BaseOAuthProvider implements AuthProvider {
  abstract readonly method: AuthMethod;

  /** Interactive flows cannot silently fetch a fresh token once it lapses */
  protected abstract readonly interactive: boolean;

  protected readonly http: HTTPClient;
  private token: OAuthToken | null = null;
  private pending: Promise<OAuthToken> | null = null;

  constructor(
    protected readonly settings: OAuthSettings,
    private readonly transport: TransportClient,
    http?: HTTPClient
  ) {
    this.http = http ?? new HTTPClient();
  }

  /**
   * Obtain a token from scratch (consent, client secret, device code)
   */
  protected abstract requestToken(): Promise<OAuthToken>;

  async prepareAccess(): Promise<void> {
    if (this.token) return;
    try {
      await this.acquire(() => this.requestToken());
    } catch (error) {
      if (error instanceof AuthPreparationError) throw error;
      throw new AuthPreparationError(`${this.method}: ${getErrorMessage(error)}`);
    }
  }

  client(): TransportClient {
    return this.transport;
  }

  async modify(_params: Params, request: OutgoingRequest): Promise<void> {
    try {
      const token = await this.currentToken();
      request.headers.authorization = `${token.tokenType} ${token.accessToken}`;
    } catch (error) {
      logger.warn(`[${this.method}] Forwarding without credentials: ${getErrorMessage(error)}`);
    }
  }

  protected get tokenUrl(): string {
    return aadEndpoint(this.settings.authority, this.settings.tenantId, 'token');
  }

  /**
   * Current token, refreshed or re-requested when it is about to expire
   */
  async currentToken(): Promise<OAuthToken> {
    const token = this.token;

    if (token && !this.isStale(token)) {
      return token;
    }
    if (this.pending) {
      return this.pending;
    }

    const refreshToken = token?.refreshToken;
    if (refreshToken) {
      return this.acquire(() => this.refresh(refreshToken));
    }
    if (!this.interactive) {
      return this.acquire(() => this.requestToken());
    }

    throw new Error(token
      ? 'Token expired and no refresh token was issued'
      : 'No token available; access was never prepared');
  }

  private isStale(token: OAuthToken): boolean {
    return token.expiresAt !== undefined && Date.now() >= token.expiresAt - EXPIRY_SKEW_MS;
  }

  private acquire(fetchToken: () => Promise<OAuthToken>): Promise<OAuthToken> {
    if (!this.pending) {
      this.pending = fetchToken()
        .then((token) => {
          this.token = token;
          return token;
        })
        .finally(() => {
          this.pending = null;
        });
    }
    return this.pending;
  }

  private async refresh(refreshToken: string): Promise<OAuthToken> {
    logger.debug(`[${this.method}] Refreshing access token`);
    const form: Record<string, string> = {
      grant_type: 'refresh_token',
      client_id: this.settings.clientId,
      refresh_token: refreshToken,
      scope: this.settings.scopes.join(' ')
    };
    if (this.settings.clientSecret) {
      form.client_secret = this.settings.clientSecret;
    }

    const token = await this.exchange(form);
    // servers may omit a rotated refresh token
    return { ...token, refreshToken: token.refreshToken ?? refreshToken };
  }

  /**
   * POST a grant to the token endpoint and parse the issued token
   */
  protected async exchange(form: Record<string, string>): Promise<OAuthToken> {
    const response = await this.http.postForm(this.tokenUrl, form);
    return parseTokenResponse(response);
  }
}

/**
 * Describe an OAuth error body, falling back to the HTTP status
 */
export function describeOAuthError(response: HTTPResponse<unknown>): string {
  const parsed = OAuthErrorSchema.safeParse(response.data);
  if (parsed.success) {
    return parsed.data.error_description
      ? `${parsed.data.error}: ${parsed.data.error_description}`
      : parsed.data.error;
  }
  return `HTTP ${response.status} ${response.statusText}`;
}

export function parseTokenResponse(response: HTTPResponse<unknown>): OAuthToken {
  if (response.status < 200 || response.status >= 300) {
    throw new Error(`Token request failed: ${describeOAuthError(response)}`);
  }

  const parsed = TokenResponseSchema.safeParse(response.data);
  if (!parsed.success) {
    throw new Error(`Malformed token response: ${parsed.error.issues.map((issue) => issue.message).join(', ')}`);
  }

  const { access_token, token_type, expires_in, refresh_token } = parsed.data;
  return {
    accessToken: access_token,
    tokenType: token_type,
    refreshToken: refresh_token,
    expiresAt: expires_in !== undefined ? Date.now() + expires_in * 1000 : undefined
  };
}
