/**
 * Device Flow Provider
 *
 * Shows the user a code to enter on another device, then polls the token
 * endpoint until the sign-in completes, is declined or expires.
 *
 * Auto-registers on import via registerProvider().
 */

import chalk from 'chalk';
import { z } from 'zod';
import {
  BaseOAuthProvider,
  OAuthErrorSchema,
  describeOAuthError,
  oauthSettings,
  parseTokenResponse
} from '../../core/base/oauth-provider.js';
import type { OAuthSettings, OAuthToken } from '../../core/base/oauth-provider.js';
import { aadEndpoint } from '../../core/base/aad-endpoints.js';
import { HTTPClient } from '../../core/base/http-client.js';
import { registerProvider } from '../../core/decorators.js';
import { AuthMethod } from '../../../proxy/types.js';
import type { TransportClient } from '../../../proxy/types.js';
import { ConfigurationError } from '../../../utils/errors.js';
import { logger } from '../../../utils/logger.js';

const DEVICE_CODE_GRANT = 'urn:ietf:params:oauth:grant-type:device_code';
const SLOW_DOWN_STEP_MS = 5000;

export const DeviceCodeSchema = z.object({
  device_code: z.string(),
  user_code: z.string(),
  verification_uri: z.string(),
  expires_in: z.coerce.number(),
  interval: z.coerce.number().default(5),
  message: z.string().optional()
});

export type DeviceCode = z.infer<typeof DeviceCodeSchema>;

export interface DeviceFlowOptions {
  http?: HTTPClient;
  sleep?: (ms: number) => Promise<void>;
  /** Shows the sign-in instructions to the user */
  notify?: (instructions: string) => void;
}

const defaultSleep = (ms: number): Promise<void> => new Promise(resolve => setTimeout(resolve, ms));

const defaultNotify = (instructions: string): void => {
  console.log(chalk.cyan(instructions));
};

export class DeviceFlowProvider extends BaseOAuthProvider {
  readonly method = AuthMethod.DeviceFlow;
  protected readonly interactive = true;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly notify: (instructions: string) => void;

  constructor(settings: OAuthSettings, transport: TransportClient, options: DeviceFlowOptions = {}) {
    super(settings, transport, options.http);
    this.sleep = options.sleep ?? defaultSleep;
    this.notify = options.notify ?? defaultNotify;
  }

  protected async requestToken(): Promise<OAuthToken> {
    const device = await this.requestDeviceCode();
    this.notify(device.message
      ?? `To sign in, open ${device.verification_uri} and enter the code ${device.user_code}`);

    return this.poll(device);
  }

  private async requestDeviceCode(): Promise<DeviceCode> {
    const url = aadEndpoint(this.settings.authority, this.settings.tenantId, 'devicecode');
    const response = await this.http.postForm(url, {
      client_id: this.settings.clientId,
      scope: this.settings.scopes.join(' ')
    });

    if (response.status < 200 || response.status >= 300) {
      throw new Error(`Device code request failed: ${describeOAuthError(response)}`);
    }

    const parsed = DeviceCodeSchema.safeParse(response.data);
    if (!parsed.success) {
      throw new Error('Malformed device code response');
    }
    return parsed.data;
  }

  private async poll(device: DeviceCode): Promise<OAuthToken> {
    const deadline = Date.now() + device.expires_in * 1000;
    let intervalMs = device.interval * 1000;

    while (Date.now() < deadline) {
      await this.sleep(intervalMs);

      const response = await this.http.postForm(this.tokenUrl, {
        grant_type: DEVICE_CODE_GRANT,
        client_id: this.settings.clientId,
        device_code: device.device_code
      });

      const oauthError = OAuthErrorSchema.safeParse(response.data);
      if (response.status >= 400 && oauthError.success) {
        switch (oauthError.data.error) {
          case 'authorization_pending':
            logger.debug('[device] Waiting for the user to sign in');
            continue;
          case 'slow_down':
            intervalMs += SLOW_DOWN_STEP_MS;
            continue;
        }
      }

      return parseTokenResponse(response);
    }

    throw new Error('Device code expired before sign-in completed');
  }
}

registerProvider(AuthMethod.DeviceFlow, (_params, credentials, transport) => {
  if (!credentials.clientId || !credentials.tenantId) {
    throw new ConfigurationError('Device flow requires --client-id and --tenant-id');
  }
  return new DeviceFlowProvider(oauthSettings(credentials), transport);
});
