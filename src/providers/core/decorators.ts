/**
 * Provider Decorators
 *
 * Auto-registration helper for provider plugins
 */

import type { AuthMethod } from '../../proxy/types.js';
import { ProviderRegistry } from './registry.js';
import type { ProviderFactory } from './types.js';

/**
 * Register a provider factory on import
 */
export function registerProvider(method: AuthMethod, factory: ProviderFactory): ProviderFactory {
  ProviderRegistry.registerProvider(method, factory);
  return factory;
}
