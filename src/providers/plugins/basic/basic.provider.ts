/**
 * Basic Auth Provider
 *
 * Attaches a static username/password pair to every outgoing request.
 *
 * Auto-registers on import via registerProvider().
 */

import type { AuthProvider } from '../../core/types.js';
import { registerProvider } from '../../core/decorators.js';
import { AuthMethod } from '../../../proxy/types.js';
import type { OutgoingRequest, Params, TransportClient } from '../../../proxy/types.js';
import { ConfigurationError } from '../../../utils/errors.js';

export class BasicAuthProvider implements AuthProvider {
  readonly method = AuthMethod.Basic;
  private readonly authorization: string;

  constructor(
    username: string,
    password: string,
    private readonly transport: TransportClient
  ) {
    this.authorization = `Basic ${Buffer.from(`${username}:${password}`).toString('base64')}`;
  }

  async prepareAccess(): Promise<void> {
    // static credentials, nothing to obtain
  }

  client(): TransportClient {
    return this.transport;
  }

  async modify(_params: Params, request: OutgoingRequest): Promise<void> {
    request.headers.authorization = this.authorization;
  }
}

registerProvider(AuthMethod.Basic, (_params, credentials, transport) => {
  if (!credentials.username || !credentials.password) {
    throw new ConfigurationError('Basic auth requires --username and --password');
  }
  return new BasicAuthProvider(credentials.username, credentials.password, transport);
});
