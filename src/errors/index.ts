/**
 * Error system
 * @module errors
 */

// Base error class
export {
  AwsServiceError,
  type AwsServiceErrorParams,
  isAwsServiceError,
  simpleType,
} from './error.js';

// Error categories
export {
  AuthorizationError,
  ConfigError,
  PreconditionError,
  TransportError,
  isAuthorizationError,
} from './categories.js';

// Classification
export {
  DEFAULT_ERROR_TYPE_PREFIX,
  AUTHORIZATION_ERROR_TYPES,
  classifyError,
  isAuthorizationErrorType,
  parseErrorBody,
  toClassifiedFailure,
  type AuthorizationContext,
  type ClassifiedFailure,
  type ClassifyOptions,
  type ErrorBody,
} from './classifier.js';
