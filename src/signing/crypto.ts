/**
 * Cryptographic utilities for Signature V4 signing
 * Uses @noble/hashes for HMAC-SHA256 operations
 */

import { hmac } from '@noble/hashes/hmac';
import { sha256 } from '@noble/hashes/sha256';
import { bytesToHex, utf8ToBytes } from '@noble/hashes/utils';

/**
 * SHA-256 of the empty string
 */
export const EMPTY_SHA256 =
  'e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855';

function toBytes(data: string | Uint8Array): Uint8Array {
  return typeof data === 'string' ? utf8ToBytes(data) : data;
}

/**
 * Compute HMAC-SHA256
 */
export function hmacSha256(key: Uint8Array, data: string | Uint8Array): Uint8Array {
  return hmac(sha256, key, toBytes(data));
}

/**
 * Compute SHA-256 hash
 */
export function sha256Hash(data: string | Uint8Array): Uint8Array {
  return sha256(toBytes(data));
}

/**
 * Compute SHA-256 hash and return as lowercase hex
 */
export function sha256Hex(data: string | Uint8Array): string {
  return bytesToHex(sha256Hash(data));
}

/**
 * Convert byte array to lowercase hex string
 */
export function toHex(bytes: Uint8Array): string {
  return bytesToHex(bytes);
}

/**
 * Encode a string as UTF-8 bytes
 */
export function utf8(text: string): Uint8Array {
  return utf8ToBytes(text);
}
