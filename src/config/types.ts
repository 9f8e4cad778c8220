/**
 * Configuration types for the AWS client.
 * @module config
 */

import type { LogLevel } from '../observability/index.js';

/**
 * Scheme used to reach the endpoint.
 */
export type Protocol = 'https' | 'http';

/**
 * Fully resolved client configuration.
 */
export interface ClientConfig {
  /**
   * Endpoint host, optionally with a port. Sent as the `host` header.
   * @example 'dynamodb.us-east-1.amazonaws.com', 'localhost:8000'
   */
  readonly endpoint: string;

  /** Scheme used to reach the endpoint */
  readonly protocol: Protocol;

  /**
   * AWS region used in the credential scope.
   * @example 'us-east-1', 'eu-west-1'
   */
  readonly region: string;

  /**
   * Service name used in the credential scope.
   * @example 'dynamodb', 'kinesis', 's3'
   */
  readonly service: string;

  /**
   * Retries after the first attempt; at most `maxErrorRetry + 1` attempts.
   * @default 3
   */
  readonly maxErrorRetry: number;

  /**
   * Starting backoff ceiling in milliseconds, doubled after every failure.
   * @default 10
   */
  readonly initialBackoffMs: number;

  /**
   * Streaming upload block size in bytes. Must be greater than 8 KiB.
   * @default 524288
   */
  readonly uploadBlockSize: number;

  /**
   * Per-attempt request timeout in milliseconds.
   * @default 60000
   */
  readonly timeout: number;

  /** Content type of JSON-RPC requests */
  readonly jsonContentType: string;

  /** Namespace prefix of service error types */
  readonly errorTypePrefix: string;

  /** Minimum log level, or 'silent' */
  readonly logLevel: LogLevel | 'silent';
}

/**
 * Configuration as supplied by callers. Missing fields take their defaults;
 * a missing endpoint is derived from service and region.
 */
export type PartialClientConfig = Partial<{
  -readonly [K in keyof ClientConfig]: ClientConfig[K];
}>;
