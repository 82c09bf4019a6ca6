// Main exports for the authforward package

// Proxy
export { AuthProxy } from './proxy/server.js';
export type { AuthProxyOptions } from './proxy/server.js';
export { ForwardingEngine, buildTargetUrl, requestTargetPath } from './proxy/forwarder.js';
export { RequestExchange, suppressesCompletedLog } from './proxy/exchange.js';
export { ProxyHTTPClient } from './proxy/http-client.js';
export { isLoopbackAddr, splitHostPort } from './proxy/loopback.js';
export * from './proxy/errors.js';
export { AuthMethod, Whenlog, Whatlog } from './proxy/types.js';
export type { Params, OutgoingRequest, TransportClient, LogSink } from './proxy/types.js';

// Providers
export * from './providers/index.js';

// CLI option parsing
export { parseCliOptions } from './cli/options.js';
export type { ProxyOptions } from './cli/options.js';

// Utils
export { logger } from './utils/logger.js';
export { AuthForwardError, ConfigurationError, getErrorMessage } from './utils/errors.js';
