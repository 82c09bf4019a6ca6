/**
 * Proxy Error Hierarchy
 *
 * Every per-request failure is one of these. The forwarding engine records
 * them in the request log and answers the caller with a bare 502.
 */

/**
 * Base class for all proxy errors
 */
export class ProxyError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'ProxyError';
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      type: this.name,
      code: this.code,
      message: this.message,
      ...this.details
    };
  }
}

/**
 * The outgoing request could not be built (malformed target URL)
 */
export class ConstructionError extends ProxyError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONSTRUCTION_FAILED', details);
    this.name = 'ConstructionError';
  }
}

/**
 * Transport failures: DNS, connect, TLS, broken streams
 */
export class TransportError extends ProxyError {
  constructor(message: string, code: string = 'TRANSPORT_ERROR', details?: Record<string, unknown>) {
    super(message, code, details);
    this.name = 'TransportError';
  }
}

/**
 * Network connection errors
 */
export class NetworkError extends TransportError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'NETWORK_ERROR', details);
    this.name = 'NetworkError';
  }
}

/**
 * Request timeout errors
 */
export class TimeoutError extends TransportError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'TIMEOUT', details);
    this.name = 'TimeoutError';
  }
}

/**
 * Upstream declared gzip but the payload does not decode
 */
export class DecodeError extends ProxyError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'DECODE_FAILED', details);
    this.name = 'DecodeError';
  }
}

/**
 * The bound provider could not obtain a credential at startup. Fatal.
 */
export class AuthPreparationError extends ProxyError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'AUTH_PREPARATION_FAILED', details);
    this.name = 'AuthPreparationError';
  }
}

function errorCode(error: Error): string | undefined {
  if ('code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * zlib reports its failures with Z_* codes (Z_DATA_ERROR, Z_BUF_ERROR, ...)
 */
export function isZlibError(error: unknown): boolean {
  if (!(error instanceof Error)) return false;
  const code = errorCode(error);
  return code !== undefined && code.startsWith('Z_');
}

/**
 * Convert unknown transport-stage errors to TransportError
 */
export function normalizeTransportError(error: unknown, context?: Record<string, unknown>): ProxyError {
  if (error instanceof ProxyError) {
    return error;
  }

  if (error instanceof Error) {
    const code = errorCode(error);

    if (code === 'ETIMEDOUT' || code === 'ESOCKETTIMEDOUT') {
      return new TimeoutError(`Request timeout: ${error.message}`, {
        errorCode: code,
        ...context
      });
    }

    return new NetworkError(`Cannot reach upstream: ${error.message}`, {
      errorCode: code ?? 'UNKNOWN',
      ...context
    });
  }

  return new TransportError(String(error), 'TRANSPORT_ERROR', context);
}
