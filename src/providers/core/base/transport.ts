import { readFileSync } from 'fs';
import { ProxyHTTPClient } from '../../../proxy/http-client.js';
import type { Params } from '../../../proxy/types.js';
import { ConfigurationError, getErrorMessage } from '../../../utils/errors.js';

/**
 * Build the transport client every provider hands to the engine, applying
 * the optional trust root and the insecure switch.
 */
export function createTransportClient(params: Params): ProxyHTTPClient {
  let ca: Buffer | undefined;

  if (params.certPath) {
    try {
      ca = readFileSync(params.certPath);
    } catch (error) {
      throw new ConfigurationError(`Cannot read root CA file ${params.certPath}: ${getErrorMessage(error)}`);
    }
  }

  return new ProxyHTTPClient({
    ca,
    rejectUnauthorized: !params.insecure
  });
}
