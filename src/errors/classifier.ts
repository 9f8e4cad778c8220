/**
 * Maps failed responses and thrown values onto the error taxonomy
 * @module errors/classifier
 */

import { z } from 'zod';
import type { Credentials } from '../credentials/types.js';
import { AwsServiceError } from './error.js';
import {
  AuthorizationError,
  PreconditionError,
  TransportError,
} from './categories.js';

/**
 * Namespace prefix of error types reported by AWS JSON protocol services
 */
export const DEFAULT_ERROR_TYPE_PREFIX = 'com.amazon.coral.service#';

/**
 * Error types that mean the signature or the access key was rejected.
 * The first two are reported namespaced by JSON protocol services, the
 * last two bare by S3.
 */
export const AUTHORIZATION_ERROR_TYPES = [
  'UnrecognizedClientException',
  'InvalidSignatureException',
  'InvalidAccessKeyId',
  'SignatureDoesNotMatch',
] as const;

/**
 * Credentials in use when an attempt was rejected, so the retry driver can
 * report them to the credential source.
 */
export interface AuthorizationContext {
  readonly scope: string;
  readonly credentials: Credentials;
}

/**
 * Outcome of a failed attempt, as seen by the retry driver.
 */
export type ClassifiedFailure =
  | {
      readonly kind: 'authorization';
      readonly error: AuthorizationError;
      readonly retriable: false;
      readonly context?: AuthorizationContext;
    }
  | { readonly kind: 'service'; readonly error: AwsServiceError; readonly retriable: boolean }
  | { readonly kind: 'transport'; readonly error: Error; readonly retriable: true }
  | { readonly kind: 'precondition'; readonly error: PreconditionError; readonly retriable: false };

/**
 * Options for classifyError
 */
export interface ClassifyOptions {
  /** Namespace prefix of the service's error types */
  prefix?: string;
  /** Request ID from the response headers */
  requestId?: string;
}

/**
 * Checks whether an error type token denotes rejected credentials
 */
export function isAuthorizationErrorType(
  type: string,
  prefix: string = DEFAULT_ERROR_TYPE_PREFIX
): boolean {
  return AUTHORIZATION_ERROR_TYPES.some(
    (token) => type === prefix + token || type === token || type.endsWith('#' + token)
  );
}

/**
 * Maps an error response onto a typed error.
 *
 * Only called for status >= 400. Client errors are not retriable, server
 * errors are.
 */
export function classifyError(
  status: number,
  type: string,
  message: string,
  options: ClassifyOptions = {}
): AwsServiceError {
  if (isAuthorizationErrorType(type, options.prefix)) {
    return new AuthorizationError({
      type,
      message,
      status,
      requestId: options.requestId,
    });
  }

  return new AwsServiceError({
    type,
    message,
    retriable: Math.floor(status / 100) === 5,
    status,
    requestId: options.requestId,
  });
}

/**
 * Error type and message extracted from an error response body
 */
export interface ErrorBody {
  type: string;
  message: string;
}

/**
 * Shape of a JSON protocol error body
 */
const jsonErrorBodySchema = z.object({
  __type: z.string().optional(),
  code: z.string().optional(),
  Code: z.string().optional(),
  message: z.string().optional(),
  Message: z.string().optional(),
});

function parseJsonErrorBody(text: string): ErrorBody | undefined {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    if (error instanceof SyntaxError) {
      return undefined;
    }
    throw error;
  }

  const result = jsonErrorBodySchema.safeParse(parsed);
  if (!result.success) {
    return undefined;
  }

  const fields = result.data;
  return {
    type: fields.__type ?? fields.code ?? fields.Code ?? 'UnknownError',
    message: fields.message ?? fields.Message ?? '',
  };
}

/**
 * Unescape XML special characters; `&amp;` goes last so `&amp;lt;` stays `&lt;`.
 */
function unescapeXml(text: string): string {
  return text
    .replace(/&lt;/g, '<')
    .replace(/&gt;/g, '>')
    .replace(/&quot;/g, '"')
    .replace(/&apos;/g, "'")
    .replace(/&amp;/g, '&');
}

function xmlElement(xml: string, name: string): string | undefined {
  const match = new RegExp(`<${name}>([^<]*)</${name}>`).exec(xml);
  return match ? unescapeXml(match[1].trim()) : undefined;
}

/**
 * Reads the error type and message from a JSON (`__type`, `message`) or
 * S3 XML (`<Code>`, `<Message>`) error body.
 */
export function parseErrorBody(body: Uint8Array): ErrorBody {
  const text = new TextDecoder().decode(body).trim();

  if (text.startsWith('{')) {
    const fromJson = parseJsonErrorBody(text);
    if (fromJson) {
      return fromJson;
    }
  }

  if (text.startsWith('<')) {
    return {
      type: xmlElement(text, 'Code') ?? 'UnknownError',
      message: xmlElement(text, 'Message') ?? '',
    };
  }

  return { type: 'UnknownError', message: text };
}

/**
 * Converts whatever an attempt threw into the tagged failure the retry
 * driver inspects.
 */
export function toClassifiedFailure(
  error: unknown,
  context?: AuthorizationContext
): ClassifiedFailure {
  if (error instanceof PreconditionError) {
    return { kind: 'precondition', error, retriable: false };
  }

  if (error instanceof AuthorizationError) {
    return { kind: 'authorization', error, retriable: false, context };
  }

  if (error instanceof TransportError) {
    return { kind: 'transport', error, retriable: true };
  }

  if (error instanceof AwsServiceError) {
    return { kind: 'service', error, retriable: error.retriable };
  }

  if (error instanceof Error) {
    return { kind: 'transport', error, retriable: true };
  }

  return { kind: 'transport', error: TransportError.fromCause(error), retriable: true };
}
