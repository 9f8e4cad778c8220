/**
 * Environment variable loading for client configuration.
 * @module config/env
 */

import { ConfigError } from '../errors/index.js';
import type { ClientConfig, PartialClientConfig } from './types.js';
import { normalizeConfig } from './validation.js';

function parseIntEnv(env: NodeJS.ProcessEnv, name: string): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') {
    return undefined;
  }
  if (!/^\d+$/.test(raw.trim())) {
    throw ConfigError.invalidConfig(`${name} must be a non-negative integer, got '${raw}'`, {
      variable: name,
    });
  }
  return Number.parseInt(raw, 10);
}

/**
 * Loads client configuration from environment variables.
 *
 * Supported environment variables:
 * - AWS_REGION / AWS_DEFAULT_REGION: AWS region
 * - AWS_ENDPOINT: endpoint host or URL (e.g. 'http://localhost:8000')
 * - AWS_SERVICE: service name used in the credential scope
 * - AWS_MAX_ERROR_RETRY: retry budget
 * - AWS_UPLOAD_BLOCK_SIZE: streaming upload block size in bytes
 * - AWS_TIMEOUT_MS: request timeout in milliseconds
 *
 * Explicit overrides win over the environment.
 *
 * @throws {ConfigError} If a numeric variable is malformed or the result is invalid
 */
export function createConfigFromEnv(
  overrides: PartialClientConfig = {},
  env: NodeJS.ProcessEnv = process.env
): ClientConfig {
  const fromEnv: PartialClientConfig = {};

  const region = env.AWS_REGION || env.AWS_DEFAULT_REGION;
  if (region) {
    fromEnv.region = region;
  }

  if (env.AWS_ENDPOINT) {
    fromEnv.endpoint = env.AWS_ENDPOINT;
  }

  if (env.AWS_SERVICE) {
    fromEnv.service = env.AWS_SERVICE;
  }

  const maxErrorRetry = parseIntEnv(env, 'AWS_MAX_ERROR_RETRY');
  if (maxErrorRetry !== undefined) {
    fromEnv.maxErrorRetry = maxErrorRetry;
  }

  const uploadBlockSize = parseIntEnv(env, 'AWS_UPLOAD_BLOCK_SIZE');
  if (uploadBlockSize !== undefined) {
    fromEnv.uploadBlockSize = uploadBlockSize;
  }

  const timeout = parseIntEnv(env, 'AWS_TIMEOUT_MS');
  if (timeout !== undefined) {
    fromEnv.timeout = timeout;
  }

  return normalizeConfig({ ...fromEnv, ...overrides });
}
