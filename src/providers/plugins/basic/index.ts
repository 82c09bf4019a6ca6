/**
 * Basic Auth Provider
 *
 * Auto-registers with ProviderRegistry on import.
 */

export { BasicAuthProvider } from './basic.provider.js';
