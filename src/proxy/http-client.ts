/**
 * Proxy Transport Client
 *
 * Sends the fully buffered outgoing request and reads the upstream response
 * back into memory. TLS trust and verification are fixed per instance.
 */

import { pipeline } from 'stream/promises';
import type { Readable } from 'stream';
import { createGunzip } from 'zlib';
import https from 'https';
import http from 'http';
import type { OutgoingRequest, TransportClient } from './types.js';
import { DecodeError, TimeoutError, isZlibError, normalizeTransportError } from './errors.js';
import { logger } from '../utils/logger.js';

export interface HTTPClientOptions {
  timeout?: number;
  /** PEM trust roots replacing the default CA set */
  ca?: string | Buffer;
  rejectUnauthorized?: boolean;
}

// Connection-scoped headers, plus the framing headers the buffered body replaces
const HOP_BY_HOP_HEADERS = [
  'host',
  'connection',
  'keep-alive',
  'proxy-connection',
  'upgrade',
  'transfer-encoding',
  'content-length'
];

/**
 * Collect a readable stream into one buffer
 */
export async function readStream(stream: Readable): Promise<Buffer> {
  const chunks: Buffer[] = [];

  for await (const chunk of stream) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk));
  }

  return Buffer.concat(chunks);
}

function toWireHeaders(request: OutgoingRequest): http.OutgoingHttpHeaders {
  const wire: http.OutgoingHttpHeaders = {};

  for (const [key, value] of Object.entries(request.headers)) {
    if (value !== undefined && !HOP_BY_HOP_HEADERS.includes(key.toLowerCase())) {
      wire[key] = value;
    }
  }

  wire['content-length'] = String(request.contentLength ?? request.body.length);
  return wire;
}

/**
 * HTTP client handed out by providers through `client()`
 */
export class ProxyHTTPClient implements TransportClient {
  private httpsAgent: https.Agent;
  private httpAgent: http.Agent;
  private timeout: number;

  constructor(options: HTTPClientOptions = {}) {
    this.timeout = options.timeout || 300000; // 5 minutes default

    this.httpsAgent = new https.Agent({
      keepAlive: true,
      ca: options.ca,
      rejectUnauthorized: options.rejectUnauthorized ?? true
    });
    this.httpAgent = new http.Agent({
      keepAlive: true
    });
  }

  /**
   * Send the request and resolve with the response headers received
   */
  async send(request: OutgoingRequest): Promise<http.IncomingMessage> {
    const { url } = request;
    const isHttps = url.protocol === 'https:';
    const protocol = isHttps ? https : http;

    return new Promise((resolve, reject) => {
      const requestOptions: http.RequestOptions = {
        // WHATWG keeps the brackets around IPv6 hostnames
        hostname: url.hostname.replace(/^\[(.*)\]$/, '$1'),
        port: url.port || (isHttps ? 443 : 80),
        path: request.path,
        method: request.method,
        headers: toWireHeaders(request),
        agent: isHttps ? this.httpsAgent : this.httpAgent,
        timeout: this.timeout
      };

      const req = protocol.request(requestOptions, resolve);

      req.on('error', (error) => {
        reject(normalizeTransportError(error, { hostname: url.hostname }));
      });

      req.on('timeout', () => {
        req.destroy(new TimeoutError(`Request timeout after ${this.timeout}ms`, {
          timeout: this.timeout,
          url: url.toString()
        }));
      });

      req.end(request.body);
    });
  }

  /**
   * Read the whole response body. With `gzip` the bytes pass through a
   * gunzip stream first. The response is drained or destroyed on return.
   */
  async readBody(response: http.IncomingMessage, gzip: boolean): Promise<Buffer> {
    const chunks: Buffer[] = [];
    const collect = async (source: AsyncIterable<Buffer>): Promise<void> => {
      for await (const chunk of source) {
        chunks.push(chunk);
      }
    };

    try {
      if (gzip) {
        await pipeline(response, createGunzip(), collect);
      } else {
        await pipeline(response, collect);
      }
    } catch (error) {
      if (gzip && isZlibError(error)) {
        throw new DecodeError(`Failed to decode gzip response: ${error instanceof Error ? error.message : String(error)}`);
      }
      throw normalizeTransportError(error);
    }

    logger.debug(`[http-client] Read ${chunks.length} chunk(s) from upstream`);
    return Buffer.concat(chunks);
  }

  /**
   * Close HTTP client and cleanup agents
   */
  close(): void {
    this.httpsAgent.destroy();
    this.httpAgent.destroy();
  }
}
