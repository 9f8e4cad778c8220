/**
 * Shared, versioned credential cache.
 *
 * One instance is shared by every client and in-flight operation that uses
 * the same source:
 * - concurrent `credentials()` calls for a scope share one fetch
 * - every fetched snapshot gets a new version number
 * - `credentialsInvalid()` only evicts the entry when the reported snapshot
 *   is the one currently cached, so a late report about stale credentials
 *   never throws away fresh ones
 *
 * @module credentials/cache
 */

import { NoopLogger, logCredentialsInvalid, type Logger } from '../observability/index.js';
import type { CredentialSource, Credentials } from './types.js';

/**
 * Cache statistics.
 */
export interface CredentialCacheStats {
  /** Number of cached scopes */
  size: number;
  /** Number of cache hits */
  hits: number;
  /** Number of fetches from the wrapped source */
  fetches: number;
  /** Number of entries evicted by invalidation */
  invalidations: number;
}

export interface CachingCredentialSourceOptions {
  logger?: Logger;
}

export class CachingCredentialSource implements CredentialSource {
  private readonly source: CredentialSource;
  private readonly logger: Logger;
  private readonly cache = new Map<string, Credentials>();
  private readonly inFlight = new Map<string, Promise<Credentials>>();
  private version = 0;

  // Statistics
  private hits = 0;
  private fetches = 0;
  private invalidations = 0;

  constructor(source: CredentialSource, options: CachingCredentialSourceOptions = {}) {
    this.source = source;
    this.logger = options.logger ?? new NoopLogger();
  }

  async credentials(scope: string): Promise<Credentials> {
    const cached = this.cache.get(scope);
    if (cached) {
      this.hits++;
      return cached;
    }

    const pending = this.inFlight.get(scope);
    if (pending) {
      return pending;
    }

    const fetch = this.fetch(scope);
    this.inFlight.set(scope, fetch);
    try {
      return await fetch;
    } finally {
      this.inFlight.delete(scope);
    }
  }

  async credentialsInvalid(scope: string, credentials: Credentials, reason: string): Promise<void> {
    const cached = this.cache.get(scope);
    if (!cached || cached.version !== credentials.version) {
      this.logger.debug('Ignoring invalidation of stale credentials', {
        scope,
        reportedVersion: credentials.version,
        cachedVersion: cached?.version,
      });
      return;
    }

    this.cache.delete(scope);
    this.invalidations++;
    logCredentialsInvalid(this.logger, scope, reason);

    await this.source.credentialsInvalid(scope, credentials, reason);
  }

  /**
   * Version of the credentials cached for a scope, if any
   */
  currentVersion(scope: string): number | undefined {
    return this.cache.get(scope)?.version;
  }

  /**
   * Forces the next `credentials()` call for every scope to fetch again
   */
  clear(): void {
    this.cache.clear();
  }

  getCacheStats(): CredentialCacheStats {
    return {
      size: this.cache.size,
      hits: this.hits,
      fetches: this.fetches,
      invalidations: this.invalidations,
    };
  }

  private async fetch(scope: string): Promise<Credentials> {
    this.fetches++;
    const fetched = await this.source.credentials(scope);
    const versioned: Credentials = { ...fetched, version: ++this.version };
    this.cache.set(scope, versioned);
    return versioned;
  }
}
