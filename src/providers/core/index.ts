/**
 * Provider Core Module
 *
 * Main exports for provider plugin architecture
 */

// Types
export type {
  AuthProvider,
  ProviderCredentials,
  ProviderFactory
} from './types.js';

// Registry
export { ProviderRegistry } from './registry.js';

// Decorators
export { registerProvider } from './decorators.js';

// Base Classes
export { BaseOAuthProvider } from './base/oauth-provider.js';
export type { OAuthSettings, OAuthToken } from './base/oauth-provider.js';
export { HTTPClient } from './base/http-client.js';
export type { HTTPClientConfig, HTTPResponse } from './base/http-client.js';
export { createTransportClient } from './base/transport.js';
