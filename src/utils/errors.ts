export class AuthForwardError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'AuthForwardError';
  }
}

export class ConfigurationError extends AuthForwardError {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/**
 * Extracts error message from unknown error type
 * @param error - The caught error (unknown type)
 * @returns Error message as string
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
