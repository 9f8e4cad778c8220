/**
 * Tests for the versioned credential cache
 */

import { describe, it, expect, vi } from 'vitest';
import type { CredentialSource, Credentials } from './types.js';
import { CachingCredentialSource } from './cache.js';

/**
 * Source whose fetches resolve only when released, to exercise concurrency
 */
class DeferredSource implements CredentialSource {
  readonly fetches: Array<(credentials: Credentials) => void> = [];
  readonly invalidated = vi.fn(async (_scope: string, _credentials: Credentials, _reason: string) => {});

  credentials(_scope: string): Promise<Credentials> {
    return new Promise((resolve) => {
      this.fetches.push(resolve);
    });
  }

  credentialsInvalid(scope: string, credentials: Credentials, reason: string): Promise<void> {
    return this.invalidated(scope, credentials, reason);
  }

  release(index: number, accessKeyId: string): void {
    this.fetches[index]({ accessKeyId, secretAccessKey: 'test-secret' });
  }
}

const SCOPE = 'us-east-1/dynamodb';

describe('CachingCredentialSource', () => {
  it('should share one fetch between concurrent callers', async () => {
    const inner = new DeferredSource();
    const cache = new CachingCredentialSource(inner);

    const first = cache.credentials(SCOPE);
    const second = cache.credentials(SCOPE);
    await Promise.resolve();
    expect(inner.fetches).toHaveLength(1);

    inner.release(0, 'key-1');
    const [a, b] = await Promise.all([first, second]);

    expect(a).toBe(b);
    expect(a).toEqual({ accessKeyId: 'key-1', secretAccessKey: 'test-secret', version: 1 });
  });

  it('should serve later calls from the cache', async () => {
    const inner = new DeferredSource();
    const cache = new CachingCredentialSource(inner);

    const pending = cache.credentials(SCOPE);
    inner.release(0, 'key-1');
    await pending;

    await expect(cache.credentials(SCOPE)).resolves.toMatchObject({ version: 1 });
    expect(inner.fetches).toHaveLength(1);
    expect(cache.getCacheStats()).toEqual({ size: 1, hits: 1, fetches: 1, invalidations: 0 });
  });

  it('should keep scopes apart', async () => {
    const inner = new DeferredSource();
    const cache = new CachingCredentialSource(inner);

    const east = cache.credentials('us-east-1/dynamodb');
    const west = cache.credentials('us-west-2/dynamodb');
    inner.release(0, 'key-east');
    inner.release(1, 'key-west');

    await expect(east).resolves.toMatchObject({ accessKeyId: 'key-east', version: 1 });
    await expect(west).resolves.toMatchObject({ accessKeyId: 'key-west', version: 2 });
  });

  it('should refetch with a new version after invalidation', async () => {
    const inner = new DeferredSource();
    const cache = new CachingCredentialSource(inner);

    const pending = cache.credentials(SCOPE);
    inner.release(0, 'key-1');
    const stale = await pending;

    await cache.credentialsInvalid(SCOPE, stale, 'UnrecognizedClientException');
    expect(inner.invalidated).toHaveBeenCalledWith(SCOPE, stale, 'UnrecognizedClientException');
    expect(cache.currentVersion(SCOPE)).toBeUndefined();

    const refetch = cache.credentials(SCOPE);
    inner.release(1, 'key-2');
    await expect(refetch).resolves.toEqual({
      accessKeyId: 'key-2',
      secretAccessKey: 'test-secret',
      version: 2,
    });
  });

  it('should ignore invalidation of credentials that were already replaced', async () => {
    const inner = new DeferredSource();
    const cache = new CachingCredentialSource(inner);

    const pending = cache.credentials(SCOPE);
    inner.release(0, 'key-1');
    const stale = await pending;

    await cache.credentialsInvalid(SCOPE, stale, 'first reader');
    const refetch = cache.credentials(SCOPE);
    inner.release(1, 'key-2');
    await refetch;

    // A second reader of the old snapshot reports late
    await cache.credentialsInvalid(SCOPE, stale, 'second reader');

    expect(cache.currentVersion(SCOPE)).toBe(2);
    expect(inner.invalidated).toHaveBeenCalledTimes(1);
    expect(cache.getCacheStats().invalidations).toBe(1);
  });

  it('should let a failed fetch be retried', async () => {
    const failing: CredentialSource = {
      credentials: vi
        .fn<(scope: string) => Promise<Credentials>>()
        .mockRejectedValueOnce(new Error('unavailable'))
        .mockResolvedValueOnce({ accessKeyId: 'key-1', secretAccessKey: 'test-secret' }),
      credentialsInvalid: async () => {},
    };
    const cache = new CachingCredentialSource(failing);

    await expect(cache.credentials(SCOPE)).rejects.toThrow('unavailable');
    await expect(cache.credentials(SCOPE)).resolves.toMatchObject({ accessKeyId: 'key-1' });
  });
});
