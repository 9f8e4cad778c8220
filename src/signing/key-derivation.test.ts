/**
 * Tests for signing key derivation
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { toHex } from './crypto.js';
import { SigningKeyCache, deriveSigningKey } from './key-derivation.js';

describe('deriveSigningKey', () => {
  it('should derive the signing key from the documented example', () => {
    const key = deriveSigningKey(
      'wJalrXUtnFEMI/K7MDENG+bPxRfiCYEXAMPLEKEY',
      '20120215',
      'us-east-1',
      'iam'
    );

    expect(key.length).toBe(32);
    expect(toHex(key)).toBe('f4780e2d9f65fa895f9c67b32ce1baf0b0d8a43505a000a1a9e090d414db404d');
  });

  it('should depend on every scope component', () => {
    const base = toHex(deriveSigningKey('test-secret', '20240101', 'us-east-1', 's3'));

    expect(toHex(deriveSigningKey('test-secret', '20240102', 'us-east-1', 's3'))).not.toBe(base);
    expect(toHex(deriveSigningKey('test-secret', '20240101', 'eu-west-1', 's3'))).not.toBe(base);
    expect(toHex(deriveSigningKey('test-secret', '20240101', 'us-east-1', 'sqs'))).not.toBe(base);
  });
});

describe('SigningKeyCache', () => {
  let cache: SigningKeyCache;
  const credentials = { accessKeyId: 'test-access-key', secretAccessKey: 'test-secret' };

  beforeEach(() => {
    cache = new SigningKeyCache();
  });

  it('should return the cached key for the same scope', () => {
    const first = cache.getSigningKey(credentials, '20240101', 'us-east-1', 'dynamodb');
    const second = cache.getSigningKey(credentials, '20240101', 'us-east-1', 'dynamodb');

    expect(second).toBe(first);
    expect(cache.size).toBe(1);
    expect(toHex(first)).toBe(
      toHex(deriveSigningKey('test-secret', '20240101', 'us-east-1', 'dynamodb'))
    );
  });

  it('should keep keys for different credential versions apart', () => {
    cache.getSigningKey({ ...credentials, version: 1 }, '20240101', 'us-east-1', 'dynamodb');
    const rotated = cache.getSigningKey(
      { accessKeyId: 'test-access-key', secretAccessKey: 'other-secret', version: 2 },
      '20240101',
      'us-east-1',
      'dynamodb'
    );

    expect(cache.size).toBe(2);
    expect(toHex(rotated)).toBe(
      toHex(deriveSigningKey('other-secret', '20240101', 'us-east-1', 'dynamodb'))
    );
  });

  it('should derive a new key when the secret changes under the same access key', () => {
    cache.getSigningKey(credentials, '20240101', 'us-east-1', 'dynamodb');
    const rotated = cache.getSigningKey(
      { accessKeyId: 'test-access-key', secretAccessKey: 'rotated-secret' },
      '20240101',
      'us-east-1',
      'dynamodb'
    );

    expect(toHex(rotated)).toBe(
      toHex(deriveSigningKey('rotated-secret', '20240101', 'us-east-1', 'dynamodb'))
    );
  });

  it('should drop keys for other dates when a new date is stored', () => {
    cache.getSigningKey(credentials, '20240101', 'us-east-1', 'dynamodb');
    cache.getSigningKey(credentials, '20240101', 'us-east-1', 's3');
    expect(cache.size).toBe(2);

    cache.getSigningKey(credentials, '20240102', 'us-east-1', 'dynamodb');
    expect(cache.size).toBe(1);
  });

  it('should invalidate keys of one access key', () => {
    cache.getSigningKey(credentials, '20240101', 'us-east-1', 'dynamodb');
    cache.getSigningKey(
      { accessKeyId: 'other-access-key', secretAccessKey: 'test-secret' },
      '20240101',
      'us-east-1',
      'dynamodb'
    );

    cache.invalidate('test-access-key');
    expect(cache.size).toBe(1);

    cache.invalidate();
    expect(cache.size).toBe(0);
  });
});
