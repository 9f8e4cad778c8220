/**
 * AWS Signature V4 signing and resilient delivery
 *
 * Signs JSON-RPC calls and chunk-signed streaming uploads for AWS HTTP APIs
 * and sends them with jittered exponential backoff and credential
 * invalidation on rejected signatures.
 *
 * @module aws-sigv4-delivery
 */

// ============================================================================
// Client
// ============================================================================

export {
  AwsClient,
  AwsResponse,
  DEFAULT_STORAGE_CLASS,
  createClientFromEnv,
  type AwsClientOptions,
  type Clock,
  type UploadPayload,
} from './client/index.js';

// ============================================================================
// Configuration
// ============================================================================

export * from './config/index.js';

// ============================================================================
// Credentials
// ============================================================================

export * from './credentials/index.js';

// ============================================================================
// Error Handling
// ============================================================================

export * from './errors/index.js';

// ============================================================================
// Signing
// ============================================================================

export * from './signing/index.js';

// ============================================================================
// Retry
// ============================================================================

export * from './resilience/index.js';

// ============================================================================
// Transport
// ============================================================================

export * from './transport/index.js';

// ============================================================================
// Observability
// ============================================================================

export * from './observability/index.js';
