/**
 * Providers Module - Main Entry Point
 *
 * Imports all provider plugins to trigger auto-registration with ProviderRegistry.
 */

import { ProviderRegistry } from './core/registry.js';
import { createTransportClient } from './core/base/transport.js';
import type { AuthProvider, ProviderCredentials } from './core/types.js';
import type { Params } from '../proxy/types.js';

// Core exports
export * from './core/index.js';

// Plugin imports execute their auto-registration code on import
import './plugins/basic/index.js';
import './plugins/authcode/index.js';
import './plugins/client-credentials/index.js';
import './plugins/device-flow/index.js';

export { BasicAuthProvider } from './plugins/basic/index.js';
export { AuthCodeProvider } from './plugins/authcode/index.js';
export { ClientCredentialsProvider } from './plugins/client-credentials/index.js';
export { DeviceFlowProvider } from './plugins/device-flow/index.js';

/**
 * Build the single provider bound to `params.method`, with its transport
 */
export function createProvider(params: Params, credentials: ProviderCredentials): AuthProvider {
  const transport = createTransportClient(params);
  try {
    return ProviderRegistry.createProvider(params, credentials, transport);
  } catch (error) {
    transport.close();
    throw error;
  }
}
