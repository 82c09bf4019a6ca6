import { describe, it, expect } from 'vitest';
import {
  AuthCodeProvider,
  BasicAuthProvider,
  ClientCredentialsProvider,
  DeviceFlowProvider,
  ProviderRegistry,
  createProvider
} from '../../index.js';
import { AuthMethod } from '../../../proxy/types.js';
import type { ProviderCredentials } from '../types.js';
import { ConfigurationError } from '../../../utils/errors.js';
import { makeParams } from '../../../../tests/helpers/servers.js';

const credentials: ProviderCredentials = {
  username: 'alice',
  password: 'test-secret',
  clientId: 'test-client',
  clientSecret: 'test-secret',
  tenantId: 'test-tenant',
  authority: 'https://login.example.test',
  authCodeAddr: '127.0.0.1:8400',
  scopes: ['openid']
};

describe('ProviderRegistry', () => {
  it('should register every authentication method on import', () => {
    expect(ProviderRegistry.getMethods().sort()).toEqual(
      [AuthMethod.AuthCode, AuthMethod.Basic, AuthMethod.ClientCredentials, AuthMethod.DeviceFlow].sort()
    );
  });

  it.each([
    [AuthMethod.Basic, BasicAuthProvider],
    [AuthMethod.AuthCode, AuthCodeProvider],
    [AuthMethod.ClientCredentials, ClientCredentialsProvider],
    [AuthMethod.DeviceFlow, DeviceFlowProvider]
  ])('should build the %s provider', (method, expected) => {
    const provider = createProvider(makeParams({ method }), credentials);

    expect(provider).toBeInstanceOf(expected);
    expect(provider.method).toBe(method);
    provider.client().close();
  });

  describe('credential checks', () => {
    it('should require a username and password for basic', () => {
      expect(() => createProvider(makeParams({ method: AuthMethod.Basic }), { ...credentials, password: undefined }))
        .toThrow(new ConfigurationError('Basic auth requires --username and --password'));
    });

    it('should require a client secret for client credentials', () => {
      expect(() => createProvider(
        makeParams({ method: AuthMethod.ClientCredentials }),
        { ...credentials, clientSecret: undefined }
      )).toThrow('Client credentials require --client-id, --client-secret and --tenant-id');
    });

    it('should require a tenant for the device flow', () => {
      expect(() => createProvider(
        makeParams({ method: AuthMethod.DeviceFlow }),
        { ...credentials, tenantId: undefined }
      )).toThrow('Device flow requires --client-id and --tenant-id');
    });

    it('should require a client id for the authorization code flow', () => {
      expect(() => createProvider(
        makeParams({ method: AuthMethod.AuthCode }),
        { ...credentials, clientId: undefined }
      )).toThrow('Authorization code flow requires --client-id and --tenant-id');
    });
  });

  it('should reject an unreadable root CA file', () => {
    expect(() => createProvider(
      makeParams({ certPath: '/nonexistent/authforward-test-ca.pem' }),
      credentials
    )).toThrow(ConfigurationError);
  });
});
