/**
 * Provider Types
 *
 * The capability contract every authentication strategy satisfies. The
 * forwarding engine only ever sees this interface.
 */

import type { AuthMethod, OutgoingRequest, Params, TransportClient } from '../../proxy/types.js';

export interface AuthProvider {
  readonly method: AuthMethod;

  /**
   * Make sure a usable credential exists. Called once before the proxy
   * binds; a rejection stops the process. Calling it again is a no-op.
   */
  prepareAccess(): Promise<void>;

  /** Transport for outgoing calls, shared across concurrent requests */
  client(): TransportClient;

  /**
   * Attach credentials to `request.headers` in place. Never rejects: when no
   * credential can be attached the request goes out unauthenticated.
   */
  modify(params: Params, request: OutgoingRequest): Promise<void>;
}

/**
 * Credentials and OAuth settings collected from the command line
 */
export interface ProviderCredentials {
  username?: string;
  password?: string;
  clientId?: string;
  clientSecret?: string;
  tenantId?: string;
  authority: string;
  authCodeAddr: string;
  scopes: string[];
}

/**
 * Builds one provider from parsed parameters
 */
export type ProviderFactory = (
  params: Params,
  credentials: ProviderCredentials,
  transport: TransportClient
) => AuthProvider;
