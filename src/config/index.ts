/**
 * Client configuration
 * @module config
 */

export type { ClientConfig, PartialClientConfig, Protocol } from './types.js';
export {
  DEFAULT_JSON_CONTENT_TYPE,
  DEFAULT_MAX_ERROR_RETRY,
  DEFAULT_REGION,
  DEFAULT_SERVICE,
  DEFAULT_TIMEOUT,
  createDefaultConfig,
  defaultEndpoint,
} from './defaults.js';
export { normalizeConfig, validateConfig } from './validation.js';
export { createConfigFromEnv } from './env.js';
