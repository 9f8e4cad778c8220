/**
 * Configuration validation and normalization.
 * @module config/validation
 */

import { z } from 'zod';
import { ConfigError } from '../errors/index.js';
import { MIN_BLOCK_SIZE } from '../signing/index.js';
import { createDefaultConfig, defaultEndpoint } from './defaults.js';
import type { ClientConfig, PartialClientConfig, Protocol } from './types.js';

/**
 * Zod schema for configuration validation.
 */
const configSchema = z.object({
  endpoint: z
    .string()
    .min(1)
    .regex(/^[^/\s]+$/, 'must be a host name, optionally with a port'),
  protocol: z.enum(['https', 'http']),
  region: z.string().min(1),
  service: z.string().min(1),
  maxErrorRetry: z.number().int().nonnegative(),
  initialBackoffMs: z.number().int().positive(),
  uploadBlockSize: z
    .number()
    .int()
    .gt(MIN_BLOCK_SIZE, `must be greater than ${MIN_BLOCK_SIZE} bytes`),
  timeout: z.number().positive(),
  jsonContentType: z.string().min(1),
  errorTypePrefix: z.string(),
  logLevel: z.enum(['error', 'warn', 'info', 'debug', 'trace', 'silent']),
});

/**
 * Validates a configuration.
 *
 * @throws {ConfigError} Listing every invalid field
 */
export function validateConfig(config: ClientConfig): ClientConfig {
  const result = configSchema.safeParse(config);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    throw ConfigError.invalidConfig(`Invalid configuration: ${issues.join(', ')}`, {
      issues,
    });
  }
  return config;
}

/**
 * Fills in defaults and validates the result.
 *
 * An endpoint given as a URL (`http://localhost:8000/`) is split into its
 * protocol and host; a missing endpoint becomes the regional endpoint of the
 * configured service.
 */
export function normalizeConfig(partial: PartialClientConfig = {}): ClientConfig {
  const defaults = createDefaultConfig();
  const region = partial.region ?? defaults.region;
  const service = partial.service ?? defaults.service;

  let protocol: Protocol = partial.protocol ?? defaults.protocol;
  let endpoint = partial.endpoint ?? defaultEndpoint(service, region);

  const match = /^(https?):\/\/([^/]*)\/*$/i.exec(endpoint);
  if (match) {
    protocol = match[1].toLowerCase() === 'http' ? 'http' : 'https';
    endpoint = match[2];
  }

  // An explicit undefined keeps the default
  const given = Object.fromEntries(Object.entries(partial).filter(([, value]) => value !== undefined));

  return validateConfig({
    ...defaults,
    ...given,
    region,
    service,
    protocol,
    endpoint,
  });
}
