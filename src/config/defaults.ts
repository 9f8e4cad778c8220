/**
 * Default configuration values for the AWS client.
 * @module config/defaults
 */

import { DEFAULT_ERROR_TYPE_PREFIX } from '../errors/index.js';
import { DEFAULT_INITIAL_MAX_SLEEP_MS } from '../resilience/index.js';
import { DEFAULT_BLOCK_SIZE } from '../signing/index.js';
import type { ClientConfig } from './types.js';

/**
 * Default AWS region.
 */
export const DEFAULT_REGION = 'us-east-1';

/**
 * Default service when none is configured.
 */
export const DEFAULT_SERVICE = 'dynamodb';

/**
 * Default retry budget.
 */
export const DEFAULT_MAX_ERROR_RETRY = 3;

/**
 * Default request timeout in milliseconds (60 seconds).
 */
export const DEFAULT_TIMEOUT = 60000;

/**
 * Content type of AWS JSON 1.1 protocol requests.
 */
export const DEFAULT_JSON_CONTENT_TYPE = 'application/x-amz-json-1.1';

/**
 * Builds the regional endpoint host for a service.
 *
 * @example defaultEndpoint('kinesis', 'eu-west-1') // 'kinesis.eu-west-1.amazonaws.com'
 */
export function defaultEndpoint(service: string, region: string): string {
  return `${service}.${region}.amazonaws.com`;
}

/**
 * Creates the default configuration.
 */
export function createDefaultConfig(): ClientConfig {
  return {
    endpoint: defaultEndpoint(DEFAULT_SERVICE, DEFAULT_REGION),
    protocol: 'https',
    region: DEFAULT_REGION,
    service: DEFAULT_SERVICE,
    maxErrorRetry: DEFAULT_MAX_ERROR_RETRY,
    initialBackoffMs: DEFAULT_INITIAL_MAX_SLEEP_MS,
    uploadBlockSize: DEFAULT_BLOCK_SIZE,
    timeout: DEFAULT_TIMEOUT,
    jsonContentType: DEFAULT_JSON_CONTENT_TYPE,
    errorTypePrefix: DEFAULT_ERROR_TYPE_PREFIX,
    logLevel: 'warn',
  };
}
