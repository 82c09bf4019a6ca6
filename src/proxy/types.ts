/**
 * Proxy Types
 *
 * Type definitions shared by the forwarding engine, the transport client
 * and the authentication providers.
 */

import type { IncomingHttpHeaders, IncomingMessage } from 'http';

/**
 * Authentication method bound to the proxy for its whole lifetime
 */
export enum AuthMethod {
  Basic = 'basic',
  AuthCode = 'authcode',
  ClientCredentials = 'client',
  DeviceFlow = 'device'
}

/**
 * When a request log block is printed
 */
export enum Whenlog {
  /** only requests that aborted before a response was written */
  OnError = 'onError',
  /** aborted requests and responses whose status is not exactly 200 */
  OnNon200 = 'onNon200',
  Always = 'always'
}

/**
 * What a request log block contains
 */
export enum Whatlog {
  /** method, URL, status and error message */
  Basic = 'basic',
  /** additionally the request and response bodies */
  Detailed = 'detailed'
}

/**
 * Process-wide proxy parameters. Frozen once parsed.
 */
export interface Params {
  readonly local: string;
  readonly remote: string;
  readonly method: AuthMethod;
  readonly certPath?: string;
  readonly insecure: boolean;
  readonly whenlog: Whenlog;
  readonly whatlog: Whatlog;
}

/**
 * Request sent to the remote endpoint.
 *
 * `headers` is the inbound request's header object itself, not a copy:
 * whatever a provider attaches is visible on the inbound request too.
 */
export interface OutgoingRequest {
  method: string;
  /** scheme and host of the remote; its path is not what goes on the wire */
  url: URL;
  /** inbound request-target (path and query) exactly as received */
  path: string;
  headers: IncomingHttpHeaders;
  /** inbound Content-Length; the body length is sent when absent */
  contentLength?: number;
  body: Buffer;
}

/**
 * Transport used to reach the remote endpoint. Supplied by the provider.
 */
export interface TransportClient {
  /** Send the request; resolves once response headers arrive */
  send(request: OutgoingRequest): Promise<IncomingMessage>;

  /** Read the whole response, gunzipping when asked. Always releases the response. */
  readBody(response: IncomingMessage, gzip: boolean): Promise<Buffer>;

  close(): void;
}

/**
 * Sink receiving one finished request log block
 */
export type LogSink = (block: string) => void;
