/**
 * Signing key derivation for Signature V4
 */

import type { Credentials } from '../credentials/types.js';
import { hmacSha256, sha256Hex, utf8 } from './crypto.js';

/**
 * Terminator of every credential scope
 */
export const SCOPE_TERMINATOR = 'aws4_request';

/**
 * Derive signing key using HMAC-SHA256 chaining
 * kSecret = "AWS4" + secretAccessKey
 * kDate = HMAC-SHA256(kSecret, dateStamp)
 * kRegion = HMAC-SHA256(kDate, region)
 * kService = HMAC-SHA256(kRegion, service)
 * kSigning = HMAC-SHA256(kService, "aws4_request")
 */
export function deriveSigningKey(
  secretAccessKey: string,
  dateStamp: string,
  region: string,
  service: string
): Uint8Array {
  const kDate = hmacSha256(utf8('AWS4' + secretAccessKey), dateStamp);
  const kRegion = hmacSha256(kDate, region);
  const kService = hmacSha256(kRegion, service);
  return hmacSha256(kService, SCOPE_TERMINATOR);
}

interface CachedKey {
  key: Uint8Array;
  dateStamp: string;
}

/**
 * Cache of derived signing keys.
 *
 * Keyed by credential version, access key, date, region, service and a
 * fingerprint of the secret; a secret rotated under the same access key id
 * gets a fresh key. A key is only good for its date, so entries for other
 * dates are dropped whenever a new one is stored. The client calls `invalidate()` whenever
 * credentials are reported invalid.
 */
export class SigningKeyCache {
  private readonly cache = new Map<string, CachedKey>();

  getSigningKey(
    credentials: Credentials,
    dateStamp: string,
    region: string,
    service: string
  ): Uint8Array {
    const cacheKey = [
      credentials.version ?? 0,
      credentials.accessKeyId,
      dateStamp,
      region,
      service,
      sha256Hex(credentials.secretAccessKey).slice(0, 16),
    ].join(':');

    const cached = this.cache.get(cacheKey);
    if (cached) {
      return cached.key;
    }

    const key = deriveSigningKey(credentials.secretAccessKey, dateStamp, region, service);
    this.cleanup(dateStamp);
    this.cache.set(cacheKey, { key, dateStamp });

    return key;
  }

  /**
   * Drops cached keys derived for an access key, or every key when none is
   * given
   */
  invalidate(accessKeyId?: string): void {
    if (accessKeyId === undefined) {
      this.cache.clear();
      return;
    }

    for (const cacheKey of [...this.cache.keys()]) {
      if (cacheKey.split(':')[1] === accessKeyId) {
        this.cache.delete(cacheKey);
      }
    }
  }

  /**
   * Clear all cached keys
   */
  clear(): void {
    this.cache.clear();
  }

  get size(): number {
    return this.cache.size;
  }

  private cleanup(currentDate: string): void {
    for (const [cacheKey, value] of [...this.cache.entries()]) {
      if (value.dateStamp !== currentDate) {
        this.cache.delete(cacheKey);
      }
    }
  }
}
