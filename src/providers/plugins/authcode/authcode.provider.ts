/**
 * Authorization Code Provider
 *
 * Interactive consent: serves a one-shot callback listener, opens the
 * authorize page in the system browser and exchanges the returned code for
 * tokens. Later expiries are covered by the refresh token.
 *
 * Auto-registers on import via registerProvider().
 */

import { createServer } from 'http';
import type { IncomingMessage, Server, ServerResponse } from 'http';
import { randomBytes } from 'crypto';
import open from 'open';
import chalk from 'chalk';
import { BaseOAuthProvider, oauthSettings } from '../../core/base/oauth-provider.js';
import type { OAuthSettings, OAuthToken } from '../../core/base/oauth-provider.js';
import { aadEndpoint, callbackUrl } from '../../core/base/aad-endpoints.js';
import type { HTTPClient } from '../../core/base/http-client.js';
import { registerProvider } from '../../core/decorators.js';
import { AuthMethod } from '../../../proxy/types.js';
import type { TransportClient } from '../../../proxy/types.js';
import { splitHostPort } from '../../../proxy/loopback.js';
import { ConfigurationError } from '../../../utils/errors.js';

const CALLBACK_PATH = '/callback';

export interface AuthCodeOptions {
  /** host:port of the local callback listener */
  callbackAddr: string;
  http?: HTTPClient;
  /** Opens the authorize URL for the user */
  launchBrowser?: (url: string) => Promise<void>;
  timeoutMs?: number;
}

type CallbackResult = { code: string } | { error: string };

const defaultLaunchBrowser = async (url: string): Promise<void> => {
  console.log(chalk.white('Opening browser for authentication...'));
  console.log(chalk.dim(`If it does not open, visit: ${url}`));
  await open(url);
};

function renderPage(success: boolean, error?: string): string {
  return `<!DOCTYPE html>
<html>
  <head><meta charset="UTF-8"><title>Authentication</title></head>
  <body>
    <h2>${success ? 'Authentication Successful' : 'Authentication Failed'}</h2>
    <p>You can close this window and return to your terminal.</p>
    ${error ? `<p>Error: ${error.replace(/[<>&"]/g, '')}</p>` : ''}
  </body>
</html>`;
}

export class AuthCodeProvider extends BaseOAuthProvider {
  readonly method = AuthMethod.AuthCode;
  protected readonly interactive = true;
  private readonly callbackAddr: string;
  private readonly launchBrowser: (url: string) => Promise<void>;
  private readonly timeoutMs: number;

  constructor(settings: OAuthSettings, transport: TransportClient, options: AuthCodeOptions) {
    super(settings, transport, options.http);
    this.callbackAddr = options.callbackAddr;
    this.launchBrowser = options.launchBrowser ?? defaultLaunchBrowser;
    this.timeoutMs = options.timeoutMs ?? 120000;
  }

  get redirectUri(): string {
    return callbackUrl(this.callbackAddr);
  }

  authorizeUrl(state: string): string {
    const url = new URL(aadEndpoint(this.settings.authority, this.settings.tenantId, 'authorize'));
    url.searchParams.set('client_id', this.settings.clientId);
    url.searchParams.set('response_type', 'code');
    url.searchParams.set('redirect_uri', this.redirectUri);
    url.searchParams.set('response_mode', 'query');
    url.searchParams.set('scope', this.settings.scopes.join(' '));
    url.searchParams.set('state', state);
    return url.toString();
  }

  protected async requestToken(): Promise<OAuthToken> {
    const state = randomBytes(16).toString('hex');
    const code = await this.awaitConsent(state);

    const form: Record<string, string> = {
      grant_type: 'authorization_code',
      client_id: this.settings.clientId,
      code,
      redirect_uri: this.redirectUri,
      scope: this.settings.scopes.join(' ')
    };
    if (this.settings.clientSecret) {
      form.client_secret = this.settings.clientSecret;
    }
    return this.exchange(form);
  }

  /**
   * Run the callback listener until the browser comes back with a code.
   * The listener is closed before this resolves, so its port is free again.
   */
  private async awaitConsent(state: string): Promise<string> {
    const addr = splitHostPort(this.callbackAddr);
    if (!addr) {
      throw new ConfigurationError(`Invalid callback address: ${this.callbackAddr}`);
    }

    let settle: (result: CallbackResult) => void = () => undefined;
    const callback = new Promise<CallbackResult>((resolve) => {
      settle = resolve;
    });

    const server = createServer((req, res) => {
      this.handleCallback(req, res, state, settle);
    });

    await new Promise<void>((resolve, reject) => {
      server.once('error', reject);
      server.listen(Number(addr.port), addr.host, () => resolve());
    });

    let timer: NodeJS.Timeout | undefined;
    try {
      const timeout = new Promise<never>((_resolve, reject) => {
        timer = setTimeout(() => reject(new Error('Authentication timeout - no response received')), this.timeoutMs);
      });

      await this.launchBrowser(this.authorizeUrl(state));
      const result = await Promise.race([callback, timeout]);

      if ('error' in result) {
        throw new Error(result.error);
      }
      return result.code;
    } finally {
      clearTimeout(timer);
      await closeServer(server);
    }
  }

  private handleCallback(
    req: IncomingMessage,
    res: ServerResponse,
    state: string,
    settle: (result: CallbackResult) => void
  ): void {
    const url = new URL(req.url || '/', `http://${this.callbackAddr}`);

    if (url.pathname !== CALLBACK_PATH) {
      res.writeHead(404, { 'Content-Type': 'text/plain' });
      res.end('Not Found');
      return;
    }

    const query = url.searchParams;
    const code = query.get('code');
    let result: CallbackResult;

    if (query.get('state') !== state) {
      result = { error: 'State mismatch in OAuth callback' };
    } else if (query.get('error')) {
      result = { error: query.get('error_description') || query.get('error') || 'Authorization denied' };
    } else if (!code) {
      result = { error: 'Missing code parameter in OAuth callback' };
    } else {
      result = { code };
    }

    const success = 'code' in result;
    res.writeHead(success ? 200 : 400, {
      'Content-Type': 'text/html; charset=utf-8',
      Connection: 'close'
    });
    res.end(renderPage(success, 'error' in result ? result.error : undefined));
    settle(result);
  }
}

function closeServer(server: Server): Promise<void> {
  return new Promise((resolve) => {
    server.close(() => resolve());
    server.closeAllConnections();
  });
}

registerProvider(AuthMethod.AuthCode, (_params, credentials, transport) => {
  if (!credentials.clientId || !credentials.tenantId) {
    throw new ConfigurationError('Authorization code flow requires --client-id and --tenant-id');
  }
  return new AuthCodeProvider(oauthSettings(credentials), transport, {
    callbackAddr: credentials.authCodeAddr
  });
});
