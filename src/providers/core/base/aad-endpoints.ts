/**
 * Azure AD v2.0 endpoint construction
 */

export const DEFAULT_AUTHORITY = 'https://login.microsoftonline.com';

export type AADEndpoint = 'authorize' | 'token' | 'devicecode';

export function aadEndpoint(authority: string, tenantId: string, endpoint: AADEndpoint): string {
  return `${authority.replace(/\/$/, '')}/${encodeURIComponent(tenantId)}/oauth2/v2.0/${endpoint}`;
}

/**
 * Redirect URI served by the local authorization code listener
 */
export function callbackUrl(addr: string): string {
  return `http://${addr}/callback`;
}
