/**
 * Error types for HTTP Signatures
 */

/**
 * Authentication failure caused by the request itself: a missing or corrupt
 * Authorization header, unsigned required headers, a stale date or a
 * signature that does not verify.
 */
export class SignatureError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SignatureError';
  }
}

/**
 * Misuse of the engine detected while configuring it
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export function isSignatureError(error: unknown): error is SignatureError {
  return error instanceof SignatureError;
}
