import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error raised when a validated specification still cannot be rendered into a
 * request path. This signals a bug in the vocabulary tables, not bad user input.
 */
export class ConstructURLError extends Error {
  /** ConstructURLError error-name */
  name = 'ConstructURLError';
  /** Segments rendered before the failure */
  #segments: readonly string[];

  /** Creates a new instance of a ConstructURLError with the segments rendered so far */
  constructor(message: string, segments: readonly string[], opts?: ErrorOptions) {
    super(message, opts);
    this.#segments = [...segments];
  }

  /** Segments rendered before the failure */
  get segments(): readonly string[] {
    return this.#segments;
  }
}

/**
 * Extract a {@link ConstructURLError} from an unknown error value, following nested causes.
 */
export function getConstructURLError(error: unknown): ConstructURLError | null {
  return unwrapErrorType(ConstructURLError, error);
}

/**
 * Type guard for {@link ConstructURLError}.
 */
export function isConstructURLError(error: unknown): error is ConstructURLError {
  return isErrorType(ConstructURLError, error);
}
