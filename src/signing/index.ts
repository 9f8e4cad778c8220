/**
 * Signature V4 signing module
 *
 * - Canonical request construction
 * - Signing key derivation with caching
 * - Request signing and the authorization header
 * - Chunk signature chaining for streaming uploads
 * - Cryptographic utilities (HMAC-SHA256, SHA-256)
 */

// Types
export type {
  CanonicalRequest,
  QueryParams,
  RequestSignature,
  SignableChunk,
  SignableRequest,
  SignedRequest,
  SigningInput,
} from './types.js';

// Canonical request
export {
  STREAMING_PAYLOAD,
  buildCanonicalRequest,
  getCanonicalHeaders,
  getCanonicalQueryString,
  serializeCanonicalRequest,
  signedHeaderNames,
  uriEncode,
  uriEncodePath,
} from './canonical.js';

// Signing key derivation
export { SCOPE_TERMINATOR, SigningKeyCache, deriveSigningKey } from './key-derivation.js';

// Request signer
export {
  RequestSigner,
  SIGNING_ALGORITHM,
  createCredentialScope,
  createStringToSign,
  formatAuthorizationHeader,
  sign,
  type RequestSignerConfig,
} from './signer.js';

// Streaming uploads
export {
  CHUNK_SIGNING_ALGORITHM,
  ChunkSignatureChain,
  DEFAULT_BLOCK_SIZE,
  MIN_BLOCK_SIZE,
  assertBlockSize,
  awsChunkedLength,
  createChunkStringToSign,
  encodeAwsChunk,
  readBlocks,
  signChunk,
  type ChunkSignatureChainParams,
  type SignedChunk,
} from './chunked.js';

// Cryptographic utilities
export { EMPTY_SHA256, hmacSha256, sha256Hash, sha256Hex, toHex, utf8 } from './crypto.js';

// Date formatting
export {
  formatAmzDate,
  formatDateStamp,
  formatTimeStamp,
  parseAmzDate,
  toAmzTimestamp,
  type AmzTimestamp,
} from './format.js';
