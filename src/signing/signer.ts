/**
 * RequestSigner - Signature V4 request signing
 */

import type { Credentials } from '../credentials/types.js';
import { setHeader } from '../transport/types.js';
import {
  buildCanonicalRequest,
  serializeCanonicalRequest,
  signedHeaderNames,
} from './canonical.js';
import { hmacSha256, sha256Hex, toHex } from './crypto.js';
import { formatAmzDate, toAmzTimestamp } from './format.js';
import { SCOPE_TERMINATOR, SigningKeyCache } from './key-derivation.js';
import type {
  RequestSignature,
  SignableRequest,
  SignedRequest,
  SigningInput,
} from './types.js';

export const SIGNING_ALGORITHM = 'AWS4-HMAC-SHA256';

/**
 * `<date>/<region>/<service>/aws4_request`
 */
export function createCredentialScope(dateStamp: string, region: string, service: string): string {
  return `${dateStamp}/${region}/${service}/${SCOPE_TERMINATOR}`;
}

/**
 * Creates the string to sign:
 * ALGORITHM\n
 * TIMESTAMP\n
 * CREDENTIAL_SCOPE\n
 * HEX(SHA256(CANONICAL_REQUEST))
 */
export function createStringToSign(request: SignableRequest): string {
  return [
    SIGNING_ALGORITHM,
    `${request.dateStamp}T${request.timeStampUTC}`,
    createCredentialScope(request.dateStamp, request.region, request.service),
    sha256Hex(serializeCanonicalRequest(request.canonicalRequest)),
  ].join('\n');
}

/**
 * Signs a request with an already derived signing key
 */
export function sign(request: SignableRequest, signingKey: Uint8Array): RequestSignature {
  const stringToSign = createStringToSign(request);
  const signature = hmacSha256(signingKey, stringToSign);
  return { stringToSign, signature, signatureHex: toHex(signature) };
}

/**
 * Formats the authorization header value. The names must be the header
 * set the canonical request was built from.
 */
export function formatAuthorizationHeader(
  accessKeyId: string,
  credentialScope: string,
  signedHeaders: readonly string[],
  signatureHex: string
): string {
  return [
    `${SIGNING_ALGORITHM} Credential=${accessKeyId}/${credentialScope}`,
    `SignedHeaders=${[...signedHeaders].sort().join(';')}`,
    `Signature=${signatureHex}`,
  ].join(', ');
}

export interface RequestSignerConfig {
  region: string;
  service: string;
  keyCache?: SigningKeyCache;
}

export class RequestSigner {
  readonly region: string;
  readonly service: string;
  private readonly keyCache: SigningKeyCache;

  constructor(config: RequestSignerConfig) {
    this.region = config.region;
    this.service = config.service;
    this.keyCache = config.keyCache ?? new SigningKeyCache();
  }

  /**
   * Sign a request with Signature V4.
   *
   * Sets `x-amz-date`, `x-amz-content-sha256` and, for temporary
   * credentials, `x-amz-security-token`, then signs every header in the
   * resulting map and adds `authorization`. Call once per attempt: the
   * timestamp is part of the signature.
   */
  signRequest(input: SigningInput, credentials: Credentials, timestamp: Date): SignedRequest {
    const { dateStamp, timeStamp } = toAmzTimestamp(timestamp);

    const headers = { ...input.headers };
    setHeader(headers, 'x-amz-date', formatAmzDate(timestamp));
    setHeader(headers, 'x-amz-content-sha256', input.payloadHash);
    if (credentials.sessionToken) {
      setHeader(headers, 'x-amz-security-token', credentials.sessionToken);
    }

    const canonicalRequest = buildCanonicalRequest(
      input.method,
      input.uri,
      input.queryParams ?? [],
      headers,
      input.payloadHash
    );

    const signingKey = this.keyCache.getSigningKey(
      credentials,
      dateStamp,
      this.region,
      this.service
    );
    const signature = sign(
      {
        dateStamp,
        timeStampUTC: timeStamp,
        region: this.region,
        service: this.service,
        canonicalRequest,
      },
      signingKey
    );

    const credentialScope = createCredentialScope(dateStamp, this.region, this.service);
    const signedHeaders = {
      ...canonicalRequest.headers,
      authorization: formatAuthorizationHeader(
        credentials.accessKeyId,
        credentialScope,
        signedHeaderNames(canonicalRequest),
        signature.signatureHex
      ),
    };

    return {
      ...signature,
      headers: signedHeaders,
      canonicalRequest,
      credentialScope,
      dateStamp,
      timeStampUTC: timeStamp,
      signingKey,
    };
  }

  /**
   * Drops cached signing keys, e.g. after credentials were rejected
   */
  invalidateKeys(accessKeyId?: string): void {
    this.keyCache.invalidate(accessKeyId);
  }
}
