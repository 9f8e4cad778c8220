/**
 * Credential sources
 * @module credentials
 */

export type { CredentialSource, Credentials } from './types.js';
export { EnvironmentCredentialSource, StaticCredentialSource } from './static.js';
export {
  CachingCredentialSource,
  type CachingCredentialSourceOptions,
  type CredentialCacheStats,
} from './cache.js';
