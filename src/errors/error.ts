/**
 * Base error class for AWS service calls
 * @module errors/error
 */

/**
 * Parameters for creating an AwsServiceError
 */
export interface AwsServiceErrorParams {
  /**
   * Error type token as reported by the service,
   * e.g. 'com.amazon.coral.service#ThrottlingException'
   */
  readonly type: string;

  /**
   * Human-readable error message
   */
  readonly message: string;

  /**
   * Whether the operation may be attempted again
   */
  readonly retriable: boolean;

  /**
   * HTTP status code (if a response was received)
   */
  readonly status?: number;

  /**
   * Request ID for troubleshooting
   */
  readonly requestId?: string;

  /**
   * Additional error details
   */
  readonly details?: Record<string, unknown>;

  /**
   * Underlying error, if this one wraps another
   */
  readonly cause?: unknown;
}

/**
 * Error reported by (or on the way to) an AWS service.
 *
 * The message is prefixed with the full type token, so logs keep the
 * namespace while `simpleType` gives the short name for display.
 */
export class AwsServiceError extends Error {
  readonly type: string;
  readonly retriable: boolean;
  readonly status?: number;
  readonly requestId?: string;
  readonly details?: Record<string, unknown>;

  /**
   * Message as reported, without the type prefix
   */
  readonly serviceMessage: string;

  constructor(params: AwsServiceErrorParams) {
    super(`${params.type}: ${params.message}`, { cause: params.cause });

    // Set the prototype explicitly to maintain instanceof checks
    Object.setPrototypeOf(this, AwsServiceError.prototype);

    this.name = 'AwsServiceError';
    this.type = params.type;
    this.retriable = params.retriable;
    this.status = params.status;
    this.requestId = params.requestId;
    this.details = params.details;
    this.serviceMessage = params.message;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Returns 'ThrottlingException' for 'com.amazon.coral.service#ThrottlingException'
   */
  get simpleType(): string {
    return simpleType(this.type);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      type: this.type,
      message: this.serviceMessage,
      retriable: this.retriable,
      status: this.status,
      requestId: this.requestId,
      details: this.details,
    };
  }

  override toString(): string {
    const parts = [this.name, `[${this.simpleType}]`];

    if (this.status) {
      parts.push(`(${this.status})`);
    }

    parts.push(`- ${this.serviceMessage}`);

    if (this.requestId) {
      parts.push(`(RequestId: ${this.requestId})`);
    }

    return parts.join(' ');
  }
}

/**
 * Strips any namespace up to and including the last '#'
 */
export function simpleType(type: string): string {
  const hash = type.lastIndexOf('#');
  return hash === -1 ? type : type.substring(hash + 1);
}

/**
 * Type guard for AwsServiceError
 */
export function isAwsServiceError(error: unknown): error is AwsServiceError {
  return error instanceof AwsServiceError;
}
