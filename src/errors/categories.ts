/**
 * Specific error categories
 * @module errors/categories
 */

import { AwsServiceError, type AwsServiceErrorParams } from './error.js';

type CategoryParams = Omit<AwsServiceErrorParams, 'retriable'>;

/**
 * The service rejected the signature or did not recognise the access key.
 *
 * Never retriable on its own; the retry driver invalidates the cached
 * credentials before deciding whether another attempt is made.
 */
export class AuthorizationError extends AwsServiceError {
  constructor(params: CategoryParams) {
    super({ ...params, retriable: false });
    this.name = 'AuthorizationError';
    Object.setPrototypeOf(this, AuthorizationError.prototype);
  }
}

/**
 * Low-level connection, TLS or timeout failure. No response was classified.
 */
export class TransportError extends AwsServiceError {
  constructor(message: string, cause?: unknown) {
    super({
      type: 'TransportFailure',
      message,
      retriable: true,
      cause,
    });
    this.name = 'TransportError';
    Object.setPrototypeOf(this, TransportError.prototype);
  }

  static timeout(timeoutMs: number): TransportError {
    return new TransportError(`Request timed out after ${timeoutMs}ms`);
  }

  static fromCause(cause: unknown): TransportError {
    const message = cause instanceof Error ? cause.message : String(cause);
    return new TransportError(message, cause);
  }
}

/**
 * A caller-side precondition does not hold. Raised before any network call
 * and never retried.
 */
export class PreconditionError extends AwsServiceError {
  readonly code: string;

  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super({
      type: 'PreconditionViolation',
      message,
      retriable: false,
      details,
    });
    this.name = 'PreconditionError';
    this.code = code;
    Object.setPrototypeOf(this, PreconditionError.prototype);
  }

  static blockSizeTooSmall(blockSize: number, minimum: number): PreconditionError {
    return new PreconditionError(
      'BLOCK_SIZE_TOO_SMALL',
      `The block size for an upload has to be bigger than ${minimum} bytes, got ${blockSize}`,
      { blockSize, minimum }
    );
  }

  static relativeUri(uri: string): PreconditionError {
    return new PreconditionError(
      'RELATIVE_URI',
      `Canonical URI must be an absolute path starting with '/': ${uri}`,
      { uri }
    );
  }

  static duplicateHeader(name: string): PreconditionError {
    return new PreconditionError(
      'DUPLICATE_HEADER',
      `Header '${name}' appears more than once after lower-casing`,
      { name }
    );
  }

  static payloadSizeMismatch(expected: number, actual: number): PreconditionError {
    return new PreconditionError(
      'PAYLOAD_SIZE_MISMATCH',
      `Payload size mismatch: declared ${expected} bytes, got ${actual}`,
      { expected, actual }
    );
  }

  static chainComplete(): PreconditionError {
    return new PreconditionError(
      'CHAIN_COMPLETE',
      'The final chunk has already been signed'
    );
  }
}

/**
 * Invalid client configuration
 */
export class ConfigError extends AwsServiceError {
  readonly code: string;

  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super({
      type: 'ConfigError',
      message,
      retriable: false,
      details,
    });
    this.name = 'ConfigError';
    this.code = code;
    Object.setPrototypeOf(this, ConfigError.prototype);
  }

  static missingCredentials(message?: string): ConfigError {
    return new ConfigError(
      'MISSING_CREDENTIALS',
      message ?? 'AWS credentials (access key ID and secret access key) are required'
    );
  }

  static invalidConfig(message: string, details?: Record<string, unknown>): ConfigError {
    return new ConfigError('INVALID_CONFIG', message, details);
  }
}

/**
 * Type guard for AuthorizationError
 */
export function isAuthorizationError(error: unknown): error is AuthorizationError {
  return error instanceof AuthorizationError;
}
