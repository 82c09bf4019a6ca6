/**
 * Provider Registry
 *
 * Maps each authentication method to the factory of its provider plugin.
 */

import type { AuthMethod, Params, TransportClient } from '../../proxy/types.js';
import { ConfigurationError } from '../../utils/errors.js';
import type { AuthProvider, ProviderCredentials, ProviderFactory } from './types.js';

export class ProviderRegistry {
  private static factories: Map<AuthMethod, ProviderFactory> = new Map();

  /**
   * Register provider factory
   */
  static registerProvider(method: AuthMethod, factory: ProviderFactory): void {
    this.factories.set(method, factory);
  }

  /**
   * Get all registered methods
   */
  static getMethods(): AuthMethod[] {
    return Array.from(this.factories.keys());
  }

  /**
   * Build the provider bound to `params.method`
   */
  static createProvider(
    params: Params,
    credentials: ProviderCredentials,
    transport: TransportClient
  ): AuthProvider {
    const factory = this.factories.get(params.method);
    if (!factory) {
      throw new ConfigurationError(`No provider registered for method: ${params.method}`);
    }
    return factory(params, credentials, transport);
  }
}
