import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error raised when every attempt of a retry loop failed with a retryable error.
 * The last attempt's error is kept as `cause`.
 */
export class RetryExhaustedError extends Error {
  /** RetryExhaustedError error-name */
  name = 'RetryExhaustedError';
  /** Attempts made before giving up */
  #attempts: number;

  /** Creates a new instance of a RetryExhaustedError with the number of attempts made */
  constructor(message: string, attempts: number, opts?: ErrorOptions) {
    super(message, opts);
    this.#attempts = attempts;
  }

  /** Attempts made before giving up */
  get attempts(): number {
    return this.#attempts;
  }

  /** Error of the final attempt, if one was recorded as cause */
  get lastError(): Error | null {
    return this.cause instanceof Error ? this.cause : null;
  }
}

/**
 * Type guard for {@link RetryExhaustedError}.
 */
export function isRetryExhaustedError(error: unknown): error is RetryExhaustedError {
  return isErrorType(RetryExhaustedError, error);
}

/**
 * Extract a {@link RetryExhaustedError} from an unknown error value, following nested causes.
 */
export function getRetryExhaustedError(error: unknown): RetryExhaustedError | null {
  return unwrapErrorType(RetryExhaustedError, error);
}
