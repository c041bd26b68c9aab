import { RetryExhaustedError } from '../error/retryExhaustedError.js';
import { RetrySuppressedError } from '../error/retrySuppressedError.js';
import { abortReason } from './signals.js';
import { sleep } from './sleep.js';
import type { SafeWrapAsync } from './wrap.js';

/** Computes the wait after failed attempt `attempt` (1-based) from the base delay. */
export type Backoff = (attempt: number, delay: number) => number;

/** `delay * attempt`: 1x, 2x, 3x the base delay. */
export const linearBackoff: Backoff = (attempt, delay) => delay * attempt;

/** Passed to {@link RetryOptions.onRetry} before each wait. */
export interface RetryEvent {
  /** The attempt that just failed */
  attempt: number;
  /** Total attempts allowed, initial attempt included */
  maxAttempts: number;
  /** Milliseconds about to be waited */
  wait: number;
  error: Error;
}

/** Options for retry-function */
export interface RetryOptions<R> {
  /** Function to execute with the 1-based attempt number; must return a tuple-style result. */
  fn: (attempt: number) => SafeWrapAsync<Error, R>;
  /**
   * Maximum number of retries after the initial attempt (total tries = attempts + 1).
   * Passing 0 means "try once, then stop."
   */
  attempts?: number;
  /** Base delay in milliseconds fed to `backoff`. */
  delay?: number;
  /** Wait strategy, {@link linearBackoff} by default. */
  backoff?: Backoff;
  /**
   * Predicate that decides whether to stop retrying.
   * Return true to stop retrying and surface the error, false to continue.
   */
  errFn?: (e: Error) => boolean;
  /** Called before each wait. */
  onRetry?: (event: RetryEvent) => void;
  /** Aborting ends a pending wait and stops the loop. */
  signal?: AbortSignal;
}

/**
 * Retry-function to keep retrying a function that returns tuple-style results,
 * waiting `backoff(attempt, delay)` between attempts.
 *
 * Returns {@link RetrySuppressedError} when `errFn` marks an error as fatal or the
 * signal aborts during a wait, and {@link RetryExhaustedError} when every attempt
 * failed. Both keep the last error as `cause`.
 */
export async function retry<R = unknown>({
  fn,
  attempts = 3,
  delay = 500,
  backoff = linearBackoff,
  errFn,
  onRetry,
  signal,
}: RetryOptions<R>): SafeWrapAsync<Error, R> {
  const maxAttempts = attempts + 1;

  for (let attempt = 1; ; attempt += 1) {
    const [err, data] = await fn(attempt);
    if (!err) {
      return [null, data];
    }

    if (typeof errFn === 'function' && errFn(err)) {
      return [new RetrySuppressedError('error further retries suppressed', attempt, { cause: err }), null];
    }

    if (attempt >= maxAttempts) {
      return [new RetryExhaustedError('error retries exhausted', attempt, { cause: err }), null];
    }

    const wait = backoff(attempt, delay);
    onRetry?.({ attempt, maxAttempts, wait, error: err });
    await sleep(wait, signal);

    if (signal?.aborted) {
      return [new RetrySuppressedError('error retry aborted', attempt, { cause: abortReason(signal) }), null];
    }
  }
}
