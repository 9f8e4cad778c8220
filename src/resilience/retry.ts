/**
 * Retry driver with jittered exponential backoff
 */

import {
  toClassifiedFailure,
  type AuthorizationContext,
  type AuthorizationError,
  type ClassifiedFailure,
} from '../errors/index.js';
import { NoopLogger, logGiveUp, logRetry, type Logger } from '../observability/index.js';
import { ExponentialBackoff, type RandomSource, type Sleeper } from './backoff.js';
import { err, ok, type Result } from './result.js';

/**
 * Called for an authorization failure before the retry decision, so the
 * next attempt picks up fresh credentials.
 */
export type AuthorizationFailureHook = (
  context: AuthorizationContext,
  error: AuthorizationError
) => Promise<void>;

/**
 * One attempt of an operation. Failures come back as values, never thrown.
 */
export type Attempt<T> = (attemptNumber: number) => Promise<Result<T, ClassifiedFailure>>;

/**
 * Retry options
 */
export interface RetryOptions {
  /** Retry budget; at most maxRetries + 1 attempts are made */
  maxRetries: number;
  /** Starting sleep ceiling in milliseconds */
  initialBackoffMs?: number;
  /** Operation name for log context */
  operation?: string;
  logger?: Logger;
  onAuthorizationFailure?: AuthorizationFailureHook;
  sleeper?: Sleeper;
  random?: RandomSource;
}

/**
 * Runs an operation body and turns whatever it throws into a classified
 * failure. `context` is read after the failure, so it can report the
 * credentials the body fetched.
 */
export async function captureAttempt<T>(
  body: () => Promise<T>,
  context?: () => AuthorizationContext | undefined
): Promise<Result<T, ClassifiedFailure>> {
  try {
    return ok(await body());
  } catch (error) {
    return err(toClassifiedFailure(error, context?.()));
  }
}

/**
 * Drives attempts strictly one after another.
 *
 * - success: the result is returned
 * - authorization failure: the hook runs first; with a hook and known
 *   credentials the attempt counts as retriable, without one it is fatal.
 *   A hook that throws is logged and the original failure stands
 * - otherwise: not retriable or out of budget rethrows the failure's error
 *   unchanged, else sleeps and tries again
 */
export class RetryExecutor {
  private readonly options: RetryOptions;
  private readonly logger: Logger;

  constructor(options: RetryOptions) {
    this.options = options;
    this.logger = options.logger ?? new NoopLogger();
  }

  async execute<T>(attempt: Attempt<T>): Promise<T> {
    const { maxRetries, operation = 'operation' } = this.options;
    const backoff = new ExponentialBackoff(maxRetries, {
      initialMaxSleepMs: this.options.initialBackoffMs,
      sleeper: this.options.sleeper,
      random: this.options.random,
    });

    for (;;) {
      const attemptNumber = backoff.triesSoFar + 1;
      const result = await attempt(attemptNumber);
      if (result.success) {
        return result.data;
      }

      const failure = result.error;
      const retriable = await this.resolveRetriable(failure);

      if (!retriable || !backoff.canRetry) {
        logGiveUp(this.logger, operation, attemptNumber, failure.error);
        throw failure.error;
      }

      const delay = backoff.nextDelay();
      logRetry(this.logger, operation, attemptNumber, maxRetries + 1, delay, failure.error);
      await backoff.sleep(delay);
      backoff.inc();
    }
  }

  private async resolveRetriable(failure: ClassifiedFailure): Promise<boolean> {
    if (failure.kind !== 'authorization') {
      return failure.retriable;
    }

    const hook = this.options.onAuthorizationFailure;
    if (!hook || !failure.context) {
      return false;
    }

    try {
      await hook(failure.context, failure.error);
    } catch (hookError) {
      this.logger.warn('Authorization failure hook failed', {
        operation: this.options.operation ?? 'operation',
        errorName: hookError instanceof Error ? hookError.name : 'Error',
        errorMessage: hookError instanceof Error ? hookError.message : String(hookError),
      });
    }
    return true;
  }
}

/**
 * Creates a retry executor with the default backoff
 */
export function createRetryExecutor(
  maxRetries: number,
  options: Omit<RetryOptions, 'maxRetries'> = {}
): RetryExecutor {
  return new RetryExecutor({ ...options, maxRetries });
}
