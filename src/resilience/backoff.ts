/**
 * Jittered exponential backoff state
 */

/**
 * Starting sleep ceiling in milliseconds
 */
export const DEFAULT_INITIAL_MAX_SLEEP_MS = 10;

/**
 * Suspends for the given number of milliseconds
 */
export type Sleeper = (ms: number) => Promise<void>;

/**
 * Returns a number in [0, 1)
 */
export type RandomSource = () => number;

export const timerSleeper: Sleeper = (ms) =>
  new Promise((resolve) => setTimeout(resolve, ms));

export interface ExponentialBackoffOptions {
  initialMaxSleepMs?: number;
  sleeper?: Sleeper;
  random?: RandomSource;
}

/**
 * Backoff state for one operation.
 *
 * After each failed attempt `inc()` counts the try and doubles the sleep
 * ceiling; the sleep itself is uniform in [1, ceiling] ms. Never shared
 * between operations.
 */
export class ExponentialBackoff {
  readonly maxRetries: number;
  private tries = 0;
  private maxSleepMs: number;
  private readonly sleeper: Sleeper;
  private readonly random: RandomSource;

  constructor(maxRetries: number, options: ExponentialBackoffOptions = {}) {
    this.maxRetries = maxRetries;
    this.maxSleepMs = options.initialMaxSleepMs ?? DEFAULT_INITIAL_MAX_SLEEP_MS;
    this.sleeper = options.sleeper ?? timerSleeper;
    this.random = options.random ?? Math.random;
  }

  get triesSoFar(): number {
    return this.tries;
  }

  get currentMaxSleepMs(): number {
    return this.maxSleepMs;
  }

  get canRetry(): boolean {
    return this.tries < this.maxRetries;
  }

  get finished(): boolean {
    return this.tries >= this.maxRetries + 1;
  }

  inc(): void {
    this.tries++;
    this.maxSleepMs *= 2;
  }

  /**
   * Uniform integer in [1, currentMaxSleepMs]
   */
  nextDelay(): number {
    return 1 + Math.floor(this.random() * this.maxSleepMs);
  }

  /**
   * Waits the given delay, or a fresh jittered one, and returns it
   */
  async sleep(delay: number = this.nextDelay()): Promise<number> {
    await this.sleeper(delay);
    return delay;
  }
}
