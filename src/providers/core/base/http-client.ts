/**
 * Simple HTTP Client for Provider Plugins
 *
 * Lightweight client for OAuth endpoints: form-encoded POSTs with timeout
 * and retry on network failures. Non-2xx responses resolve normally so that
 * OAuth error bodies (authorization_pending, invalid_grant, ...) reach the caller.
 */

import https from 'https';
import http from 'http';
import { URL } from 'url';
import { logger } from '../../../utils/logger.js';

export interface HTTPClientConfig {
  timeout?: number;                  // Timeout in milliseconds (default: 10000)
  headers?: Record<string, string>;  // Additional headers
  maxRetries?: number;               // Maximum attempts on network failure (default: 3)
  retryDelayMs?: number;             // Base backoff delay (default: 1000)
}

export interface HTTPResponse<T = unknown> {
  status: number;
  statusText: string;
  data: T;
  headers: http.IncomingHttpHeaders;
}

/**
 * Simple HTTP Client
 */
export class HTTPClient {
  private config: Required<HTTPClientConfig>;

  constructor(config: HTTPClientConfig = {}) {
    this.config = {
      timeout: 10000,
      maxRetries: 3,
      retryDelayMs: 1000,
      headers: {},
      ...config
    };
  }

  /**
   * POST an application/x-www-form-urlencoded body and parse the JSON reply
   */
  async postForm(url: string, form: Record<string, string>): Promise<HTTPResponse<unknown>> {
    const body = new URLSearchParams(form).toString();
    return this.withRetry(() => this.request('POST', url, body, {
      'Content-Type': 'application/x-www-form-urlencoded'
    }));
  }

  /**
   * Perform HTTP request
   */
  private async request(
    method: string,
    url: string,
    body: string | undefined,
    headers: Record<string, string>
  ): Promise<HTTPResponse<unknown>> {
    return new Promise((resolve, reject) => {
      const parsedUrl = new URL(url);
      const isHttps = parsedUrl.protocol === 'https:';
      const client = isHttps ? https : http;

      const requestHeaders: Record<string, string> = {
        Accept: 'application/json',
        ...this.config.headers,
        ...headers
      };

      if (body) {
        requestHeaders['Content-Length'] = Buffer.byteLength(body).toString();
      }

      const options: http.RequestOptions = {
        hostname: parsedUrl.hostname,
        port: parsedUrl.port || (isHttps ? 443 : 80),
        path: parsedUrl.pathname + parsedUrl.search,
        method,
        headers: requestHeaders,
        timeout: this.config.timeout
      };

      logger.debug(`[HTTP Request] ${method} ${url}`);

      const req = client.request(options, (res) => {
        let responseData = '';

        res.setEncoding('utf-8');
        res.on('data', (chunk: string) => {
          responseData += chunk;
        });

        res.on('end', () => {
          logger.debug(`[HTTP Response] ${res.statusCode} ${res.statusMessage}`);
          try {
            const parsedData: unknown = responseData ? JSON.parse(responseData) : null;
            resolve({
              status: res.statusCode || 0,
              statusText: res.statusMessage || '',
              data: parsedData,
              headers: res.headers
            });
          } catch (error) {
            reject(new Error(`Failed to parse response: ${error instanceof Error ? error.message : String(error)}`));
          }
        });

        res.on('error', reject);
      });

      req.on('error', (error) => {
        reject(error);
      });

      req.on('timeout', () => {
        req.destroy(new Error(`Request timeout after ${this.config.timeout}ms`));
      });

      req.end(body);
    });
  }

  /**
   * Retry wrapper with exponential backoff
   */
  private async withRetry<T>(
    fn: () => Promise<T>
  ): Promise<T> {
    let lastError: unknown;

    for (let attempt = 1; attempt <= this.config.maxRetries; attempt++) {
      try {
        return await fn();
      } catch (error) {
        lastError = error;

        logger.warn(`[Retry] Request failed (attempt ${attempt}/${this.config.maxRetries}): ${error instanceof Error ? error.message : String(error)}`);

        if (attempt < this.config.maxRetries) {
          // Exponential backoff: 1s, 2s, 4s
          const delay = this.config.retryDelayMs * Math.pow(2, attempt - 1);
          await new Promise(resolve => setTimeout(resolve, delay));
        }
      }
    }

    throw lastError;
  }
}
