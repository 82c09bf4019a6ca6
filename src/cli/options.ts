/**
 * Command-line option validation
 *
 * Turns the raw commander options into frozen proxy Params plus the
 * credentials the selected provider needs.
 */

import { z } from 'zod';
import { AuthMethod, Whatlog, Whenlog } from '../proxy/types.js';
import type { Params } from '../proxy/types.js';
import type { ProviderCredentials } from '../providers/core/types.js';
import { DEFAULT_AUTHORITY } from '../providers/core/base/aad-endpoints.js';
import { ConfigurationError } from '../utils/errors.js';

export const DEFAULT_LOCAL_ADDR = '127.0.0.1:3100';

// "offline_access" asks for a refresh token alongside the service scope
export const DEFAULT_DELEGATED_SCOPES = ['offline_access', 'api://285286f5-b97b-4b45-ba35-92a74f35756a/basic'];
// app-only tokens take the resource's .default scope and get no refresh token
export const DEFAULT_APP_SCOPES = ['https://graph.microsoft.com/.default'];

export const CliOptionsSchema = z.object({
  method: z.nativeEnum(AuthMethod, {
    errorMap: () => ({ message: 'Unexpected method value. Expected: basic, authcode, client or device' })
  }).default(AuthMethod.Basic),
  local: z.string().min(1).default(DEFAULT_LOCAL_ADDR),
  remote: z.string({ required_error: 'Missing --remote <addr>' }).min(1, 'Missing --remote <addr>'),
  cert: z.string().optional(),
  insecure: z.boolean().default(false),

  username: z.string().optional(),
  password: z.string().optional(),

  clientId: z.string().optional(),
  tenantId: z.string().optional(),
  clientSecret: z.string().optional(),
  authcodeAddr: z.string().min(1).default(DEFAULT_LOCAL_ADDR),
  authority: z.string().url().default(DEFAULT_AUTHORITY),
  scope: z.array(z.string().min(1)).optional(),

  whenlog: z.nativeEnum(Whenlog, {
    errorMap: () => ({ message: 'Unexpected whenlog value. Expected: always, onNon200 or onError' })
  }).default(Whenlog.OnError),
  whatlog: z.nativeEnum(Whatlog, {
    errorMap: () => ({ message: 'Unexpected whatlog value. Expected: basic or detailed' })
  }).default(Whatlog.Basic),
  debugmode: z.boolean().default(false)
});

export interface ProxyOptions {
  params: Params;
  credentials: ProviderCredentials;
}

/**
 * Validate raw options. Throws ConfigurationError listing every problem.
 */
export function parseCliOptions(raw: unknown): ProxyOptions {
  const result = CliOptionsSchema.safeParse(raw);
  if (!result.success) {
    const messages = result.error.issues.map((issue) => issue.message);
    throw new ConfigurationError(messages.join('\n'));
  }

  const options = result.data;

  // debug mode overrides whatever whenlog/whatlog said
  const whenlog = options.debugmode ? Whenlog.Always : options.whenlog;
  const whatlog = options.debugmode ? Whatlog.Detailed : options.whatlog;

  const params: Params = Object.freeze({
    local: options.local,
    remote: options.remote,
    method: options.method,
    certPath: options.cert,
    insecure: options.insecure,
    whenlog,
    whatlog
  });

  const defaultScopes = options.method === AuthMethod.ClientCredentials
    ? DEFAULT_APP_SCOPES
    : DEFAULT_DELEGATED_SCOPES;

  return {
    params,
    credentials: {
      username: options.username,
      password: options.password,
      clientId: options.clientId,
      clientSecret: options.clientSecret,
      tenantId: options.tenantId,
      authority: options.authority,
      authCodeAddr: options.authcodeAddr,
      scopes: options.scope ?? defaultScopes
    }
  };
}
