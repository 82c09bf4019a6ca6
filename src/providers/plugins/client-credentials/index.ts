/**
 * Client Credentials Provider
 *
 * Auto-registers with ProviderRegistry on import.
 */

export { ClientCredentialsProvider } from './client-credentials.provider.js';
