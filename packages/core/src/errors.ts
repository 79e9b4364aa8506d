/**
 * Custom error classes for @nostrand/core.
 */

/**
 * Base error class for all nostrand errors.
 * Provides a consistent error interface with error codes and cause chaining.
 */
export class NostrandError extends Error {
  public readonly code: string;

  constructor(message: string, code: string, cause?: Error) {
    super(message, { cause });
    this.name = 'NostrandError';
    this.code = code;
  }
}

/**
 * Error thrown when secret or public key material is invalid.
 * Raised once at construction, never retried.
 */
export class KeyError extends NostrandError {
  constructor(message: string, cause?: Error) {
    super(message, 'INVALID_KEY', cause);
    this.name = 'KeyError';
  }
}

/**
 * Error thrown when an event template or a received event fails validation.
 */
export class InvalidEventError extends NostrandError {
  constructor(message: string, cause?: Error) {
    super(message, 'INVALID_EVENT', cause);
    this.name = 'InvalidEventError';
  }
}

/**
 * Error thrown on local cipher misuse, such as a plaintext outside the
 * supported length range.
 */
export class CipherError extends NostrandError {
  constructor(message: string, code = 'CIPHER_ERROR') {
    super(message, code);
    this.name = 'CipherError';
  }
}

/**
 * The single outcome of every failed decryption. It carries no cause and the
 * same message whichever check rejected the envelope.
 */
export class DecryptionFailedError extends CipherError {
  constructor() {
    super('decryption failed', 'DECRYPTION_FAILED');
    this.name = 'DecryptionFailedError';
  }
}

/**
 * Error reported by a remote signer in its response to a request.
 */
export class RemoteSignerError extends NostrandError {
  constructor(
    message: string,
    public readonly requestId: string
  ) {
    super(message, 'REMOTE_SIGNER_ERROR');
    this.name = 'RemoteSignerError';
  }
}
