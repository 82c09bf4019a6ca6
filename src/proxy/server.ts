/**
 * Authenticating Proxy Server
 *
 * Prepares the bound provider's access once, then serves every inbound
 * request through the forwarding engine on the configured local address.
 */

import { createServer } from 'http';
import type { Server } from 'http';
import type { AuthProvider } from '../providers/core/types.js';
import { AuthPreparationError } from './errors.js';
import { ForwardingEngine } from './forwarder.js';
import { splitHostPort } from './loopback.js';
import type { LogSink, Params } from './types.js';
import { logger } from '../utils/logger.js';
import { ConfigurationError, getErrorMessage } from '../utils/errors.js';

export interface AuthProxyOptions {
  params: Params;
  provider: AuthProvider;
  /** Receives each request's log block; stdout when omitted */
  sink?: LogSink;
}

export class AuthProxy {
  private server: Server | null = null;
  private readonly engine: ForwardingEngine;
  private actualPort = 0;

  constructor(private readonly options: AuthProxyOptions) {
    this.engine = new ForwardingEngine(options.params, options.provider, options.sink);
  }

  /**
   * Prepare access, then start listening. Fails with AuthPreparationError
   * without binding when the provider cannot obtain a credential.
   */
  async start(): Promise<{ port: number; url: string }> {
    const { params, provider } = this.options;

    const bind = splitHostPort(params.local);
    if (!bind) {
      throw new ConfigurationError(`Invalid local address: ${params.local}`);
    }

    try {
      await provider.prepareAccess();
    } catch (error) {
      if (error instanceof AuthPreparationError) throw error;
      throw new AuthPreparationError(getErrorMessage(error), { method: provider.method });
    }

    const server = createServer((req, res) => {
      this.engine.handle(req, res).catch((error: unknown) => {
        logger.error('[proxy] Request handler failed:', error);
      });
    });
    this.server = server;

    return new Promise((resolve, reject) => {
      server.once('error', reject);

      server.listen(Number(bind.port), bind.host, () => {
        const address = server.address();
        if (typeof address === 'object' && address) {
          this.actualPort = address.port;
        }

        const host = bind.host.includes(':') ? `[${bind.host}]` : bind.host;
        const url = `http://${host}:${this.actualPort}`;
        logger.debug(`Proxy started: ${url} -> ${params.remote}`);
        resolve({ port: this.actualPort, url });
      });
    });
  }

  /**
   * Stop the proxy server
   */
  async stop(): Promise<void> {
    const server = this.server;
    if (server) {
      await new Promise<void>((resolve) => {
        server.close(() => {
          logger.debug('Proxy stopped');
          resolve();
        });
        server.closeIdleConnections();
      });
      this.server = null;
    }

    this.options.provider.client().close();
  }
}
