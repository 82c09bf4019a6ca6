/**
 * Forwarding Engine
 *
 * Proxies one inbound request to the configured remote:
 * buffer → rewrite target → provider.modify → send → decode → respond.
 *
 * Every exit path runs through `finalize`, which writes a bare 502 when no
 * response was delivered and flushes the request's log block once.
 */

import type { IncomingHttpHeaders, IncomingMessage, ServerResponse } from 'http';
import { finished } from 'stream/promises';
import type { AuthProvider } from '../providers/core/types.js';
import { RequestExchange } from './exchange.js';
import { ConstructionError, ProxyError, TransportError } from './errors.js';
import { readStream } from './http-client.js';
import { isLoopbackAddr } from './loopback.js';
import { Whatlog } from './types.js';
import type { LogSink, OutgoingRequest, Params } from './types.js';
import { logger } from '../utils/logger.js';

const defaultSink: LogSink = (block) => logger.block(block);

/**
 * The request-target sent upstream: the inbound one untouched, or only the
 * path and query of an absolute-form target. Never normalized.
 */
export function requestTargetPath(requestUrl: string | undefined): string {
  if (!requestUrl) return '/';
  if (requestUrl.startsWith('/')) return requestUrl;

  const schemeEnd = requestUrl.indexOf('://');
  if (schemeEnd < 0) {
    throw new ConstructionError(`Failed to build upstream request: unsupported request target ${requestUrl}`, {
      requestUrl
    });
  }

  const afterAuthority = requestUrl.slice(schemeEnd + 3);
  const pathStart = afterAuthority.search(/[/?]/);
  if (pathStart < 0) return '/';

  const rest = afterAuthority.slice(pathStart);
  return rest.startsWith('/') ? rest : `/${rest}`;
}

/**
 * Build the upstream URL: the inbound path and query on the configured
 * remote, over https unless the remote is a loopback address. Used for the
 * scheme, the host and the log line; the wire path is `requestTargetPath`.
 */
export function buildTargetUrl(requestUrl: string | undefined, remote: string): URL {
  const scheme = isLoopbackAddr(remote) ? 'http' : 'https';
  const pathAndQuery = requestTargetPath(requestUrl);

  try {
    return new URL(`${scheme}://${remote}${pathAndQuery}`);
  } catch (error) {
    throw new ConstructionError(`Failed to build upstream request: ${error instanceof Error ? error.message : String(error)}`, {
      remote,
      requestUrl
    });
  }
}

function parseContentLength(headers: IncomingHttpHeaders): number | undefined {
  const raw = headers['content-length'];
  if (raw === undefined) return undefined;
  const length = Number.parseInt(raw, 10);
  return Number.isNaN(length) ? undefined : length;
}

function describeError(error: unknown): string {
  if (error instanceof ProxyError) {
    return `${error.name} [${error.code}]: ${error.message}`;
  }
  if (error instanceof Error) {
    return `${error.name}: ${error.message}`;
  }
  return String(error);
}

export class ForwardingEngine {
  constructor(
    private readonly params: Params,
    private readonly provider: AuthProvider,
    private readonly sink: LogSink = defaultSink
  ) {}

  /**
   * Handle one inbound request. Never rejects.
   */
  async handle(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const exchange = new RequestExchange();

    try {
      await this.forward(req, res, exchange);
    } catch (error) {
      exchange.record(describeError(error));
    } finally {
      this.finalize(res, exchange);
    }
  }

  private async forward(
    req: IncomingMessage,
    res: ServerResponse,
    exchange: RequestExchange
  ): Promise<void> {
    const { params } = this;
    const detailed = params.whatlog === Whatlog.Detailed;

    // 1. Buffer the inbound body
    let body: Buffer;
    try {
      body = await readStream(req);
    } catch (error) {
      throw new TransportError(`Failed to read inbound request: ${error instanceof Error ? error.message : String(error)}`);
    }

    // 2. Rewrite the target onto the remote
    const method = req.method || 'GET';
    const path = requestTargetPath(req.url);
    const target = buildTargetUrl(req.url, params.remote);

    // 3. Log the request line
    exchange.record(`Requesting: ${method} ${target.origin}${path}`);
    if (detailed) {
      exchange.record(body.toString('utf-8'));
    }

    // 4. Outgoing request shares the inbound header object
    const outgoing: OutgoingRequest = {
      method,
      url: target,
      path,
      headers: req.headers,
      contentLength: parseContentLength(req.headers),
      body
    };

    // 5. Attach credentials
    await this.provider.modify(params, outgoing);

    // 6. Send
    const transport = this.provider.client();
    const upstream = await transport.send(outgoing);

    // 7. Read (and gunzip) the response
    const gzip = upstream.headers['content-encoding'] === 'gzip';
    const payload = await transport.readBody(upstream, gzip);
    const status = upstream.statusCode || 0;

    // 8. Log the response
    exchange.record(`Response status ${status}`);
    if (detailed) {
      exchange.record(payload.toString('utf-8'));
    }

    // 9. Respond with status and body only
    res.writeHead(status);
    res.end(payload);
    await finished(res);

    // 10-11. Completed; the log policy decides whether it is still printed
    exchange.complete(status, params.whenlog);
  }

  private finalize(res: ServerResponse, exchange: RequestExchange): void {
    if (!exchange.isComplete) {
      if (!res.headersSent) {
        res.writeHead(502);
        res.end();
      } else if (!res.destroyed) {
        // status already went out but the write never finished
        res.destroy();
      }
    }

    if (exchange.shouldLog) {
      this.sink(exchange.render());
    }
  }
}
