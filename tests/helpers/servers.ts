/**
 * In-process HTTP servers for proxy tests
 */

import http from 'http';
import { ForwardingEngine } from '../../src/proxy/forwarder.js';
import { ProxyHTTPClient } from '../../src/proxy/http-client.js';
import { AuthMethod, Whatlog, Whenlog } from '../../src/proxy/types.js';
import type { OutgoingRequest, Params, TransportClient } from '../../src/proxy/types.js';
import type { AuthProvider } from '../../src/providers/core/types.js';

export interface RunningServer {
  server: http.Server;
  port: number;
  /** host:port, usable as the proxy's remote */
  addr: string;
  url: string;
  close: () => Promise<void>;
}

export async function startServer(handler: http.RequestListener): Promise<RunningServer> {
  const server = http.createServer(handler);

  await new Promise<void>((resolve) => {
    server.listen(0, '127.0.0.1', () => resolve());
  });

  const address = server.address();
  const port = typeof address === 'object' && address ? address.port : 0;
  return {
    server,
    port,
    addr: `127.0.0.1:${port}`,
    url: `http://127.0.0.1:${port}`,
    close: () => new Promise<void>((resolve) => {
      server.close(() => resolve());
      server.closeAllConnections();
    })
  };
}

/**
 * A loopback port that nothing listens on
 */
export async function closedPort(): Promise<number> {
  const spare = await startServer(() => undefined);
  await spare.close();
  return spare.port;
}

export function makeParams(overrides: Partial<Params> = {}): Params {
  return {
    local: '127.0.0.1:0',
    remote: '127.0.0.1:1',
    method: AuthMethod.Basic,
    insecure: false,
    whenlog: Whenlog.Always,
    whatlog: Whatlog.Basic,
    ...overrides
  };
}

/**
 * Provider attaching a fixed bearer token
 */
export class StaticTokenProvider implements AuthProvider {
  readonly method = AuthMethod.Basic;
  prepareCalls = 0;

  constructor(
    private readonly transport: TransportClient = new ProxyHTTPClient(),
    private readonly token: string = 'test-token'
  ) {}

  async prepareAccess(): Promise<void> {
    this.prepareCalls++;
  }

  client(): TransportClient {
    return this.transport;
  }

  async modify(_params: Params, request: OutgoingRequest): Promise<void> {
    request.headers.authorization = `Bearer ${this.token}`;
  }
}

export interface EngineHarness extends RunningServer {
  blocks: string[];
  /** inbound requests as the engine saw them */
  inbound: http.IncomingMessage[];
  /** resolves once every handled request has finalized */
  settle: () => Promise<void>;
}

/**
 * Serve a ForwardingEngine directly, keeping each handle() promise so
 * tests can wait for log flushes deterministically
 */
export async function startEngine(params: Params, provider: AuthProvider): Promise<EngineHarness> {
  const blocks: string[] = [];
  const inbound: http.IncomingMessage[] = [];
  const handled: Promise<void>[] = [];
  const engine = new ForwardingEngine(params, provider, (block) => blocks.push(block));

  const running = await startServer((req, res) => {
    inbound.push(req);
    handled.push(engine.handle(req, res));
  });

  return {
    ...running,
    blocks,
    inbound,
    settle: async () => {
      await Promise.all(handled);
    }
  };
}

export interface RawResponse {
  status: number;
  body: string;
}

/**
 * Send a request with an exact request-target. `chunks` are written one by
 * one without a Content-Length, so the body goes out chunked.
 */
export async function rawRequest(
  port: number,
  path: string,
  options: { method?: string; chunks?: string[] } = {}
): Promise<RawResponse> {
  return new Promise((resolve, reject) => {
    const req = http.request(
      { host: '127.0.0.1', port, path, method: options.method ?? 'GET', agent: false },
      (res) => {
        let body = '';
        res.setEncoding('utf-8');
        res.on('data', (chunk: string) => { body += chunk; });
        res.on('end', () => resolve({ status: res.statusCode ?? 0, body }));
        res.on('error', reject);
      }
    );
    req.on('error', reject);
    for (const chunk of options.chunks ?? []) {
      req.write(chunk);
    }
    req.end();
  });
}
