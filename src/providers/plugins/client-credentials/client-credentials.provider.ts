/**
 * Client Credentials Provider
 *
 * Machine-to-machine OAuth: trades the client id and secret for an access
 * token, and simply asks again when that token lapses.
 *
 * Auto-registers on import via registerProvider().
 */

import { BaseOAuthProvider, oauthSettings } from '../../core/base/oauth-provider.js';
import type { OAuthToken } from '../../core/base/oauth-provider.js';
import { registerProvider } from '../../core/decorators.js';
import { AuthMethod } from '../../../proxy/types.js';
import { ConfigurationError } from '../../../utils/errors.js';

export class ClientCredentialsProvider extends BaseOAuthProvider {
  readonly method = AuthMethod.ClientCredentials;
  protected readonly interactive = false;

  protected async requestToken(): Promise<OAuthToken> {
    return this.exchange({
      grant_type: 'client_credentials',
      client_id: this.settings.clientId,
      client_secret: this.settings.clientSecret ?? '',
      scope: this.settings.scopes.join(' ')
    });
  }
}

registerProvider(AuthMethod.ClientCredentials, (_params, credentials, transport) => {
  if (!credentials.clientId || !credentials.clientSecret || !credentials.tenantId) {
    throw new ConfigurationError('Client credentials require --client-id, --client-secret and --tenant-id');
  }
  return new ClientCredentialsProvider(oauthSettings(credentials), transport);
});
