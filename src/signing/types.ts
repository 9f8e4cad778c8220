/**
 * Signing types for Signature V4 authentication
 */

/**
 * Query parameters in the order the caller supplied them. Serialisation
 * sorts them; an empty list signs no query string.
 */
export type QueryParams =
  | ReadonlyArray<readonly [string, string]>
  | Readonly<Record<string, string>>;

/**
 * Normalised request, ready to be serialised and hashed.
 */
export interface CanonicalRequest {
  readonly method: string;
  /** Absolute path, used verbatim */
  readonly uri: string;
  readonly queryParams: ReadonlyArray<readonly [string, string]>;
  /** Lowercase header name to verbatim value */
  readonly headers: Readonly<Record<string, string>>;
  /** Hex SHA-256 of the body, or the streaming sentinel */
  readonly payloadHash: string;
}

/**
 * A canonical request together with its signing scope and timestamp.
 */
export interface SignableRequest {
  /** YYYYMMDD */
  readonly dateStamp: string;
  /** HHMMSSZ */
  readonly timeStampUTC: string;
  readonly region: string;
  readonly service: string;
  readonly canonicalRequest: CanonicalRequest;
}

/**
 * One chunk of a streaming upload, linked to the signature before it.
 */
export interface SignableChunk {
  readonly dateStamp: string;
  readonly timeStampUTC: string;
  readonly region: string;
  readonly service: string;
  readonly previousSignatureHex: string;
  readonly chunkPayloadHash: Uint8Array;
}

/**
 * Output of signing a request
 */
export interface RequestSignature {
  readonly stringToSign: string;
  readonly signature: Uint8Array;
  readonly signatureHex: string;
}

/**
 * Input to RequestSigner.signRequest
 */
export interface SigningInput {
  method: string;
  /** Absolute path, already URI-encoded */
  uri: string;
  queryParams?: QueryParams;
  /** Headers to send; every one of them is signed */
  headers: Record<string, string>;
  payloadHash: string;
}

/**
 * A signed request: the headers to send (including `authorization`) and the
 * material the streaming chain continues from.
 */
export interface SignedRequest extends RequestSignature {
  readonly headers: Record<string, string>;
  readonly canonicalRequest: CanonicalRequest;
  readonly credentialScope: string;
  readonly dateStamp: string;
  readonly timeStampUTC: string;
  readonly signingKey: Uint8Array;
}
