/**
 * Authorization Code Provider
 *
 * Auto-registers with ProviderRegistry on import.
 */

export { AuthCodeProvider } from './authcode.provider.js';
export type { AuthCodeOptions } from './authcode.provider.js';
