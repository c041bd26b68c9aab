import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error raised when an attempt failed with an error classified as fatal, which
 * ends the retry loop early. The fatal error is kept as `cause`.
 */
export class RetrySuppressedError extends Error {
  /** RetrySuppressedError error-name */
  name = 'RetrySuppressedError';
  /** Attempts made, including the one that failed fatally */
  #attempts: number;

  /** Creates a new instance of a RetrySuppressedError with the number of attempts made */
  constructor(message: string, attempts: number, opts?: ErrorOptions) {
    super(message, opts);
    this.#attempts = attempts;
  }

  /** Attempts made, including the one that failed fatally */
  get attempts(): number {
    return this.#attempts;
  }

  /** The fatal error that stopped the loop */
  get reason(): Error | null {
    return this.cause instanceof Error ? this.cause : null;
  }
}

/**
 * Type guard for {@link RetrySuppressedError}.
 */
export function isRetrySuppressedError(error: unknown): error is RetrySuppressedError {
  return isErrorType(RetrySuppressedError, error);
}

/**
 * Extract a {@link RetrySuppressedError} from an unknown error value, following nested causes.
 */
export function getRetrySuppressedError(error: unknown): RetrySuppressedError | null {
  return unwrapErrorType(RetrySuppressedError, error);
}
