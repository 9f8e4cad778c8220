/**
 * Retry and backoff for AWS requests
 */

export {
  DEFAULT_INITIAL_MAX_SLEEP_MS,
  ExponentialBackoff,
  timerSleeper,
  type ExponentialBackoffOptions,
  type RandomSource,
  type Sleeper,
} from './backoff.js';

export {
  RetryExecutor,
  captureAttempt,
  createRetryExecutor,
  type Attempt,
  type AuthorizationFailureHook,
  type RetryOptions,
} from './retry.js';

export { err, ok, type Result } from './result.js';
