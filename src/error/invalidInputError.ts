import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error raised when a request specification or identifier is rejected before any
 * network call is made.
 */
export class InvalidInputError extends Error {
  /** InvalidInputError error-name */
  name = 'InvalidInputError';
}

/**
 * Type guard for {@link InvalidInputError}.
 */
export function isInvalidInputError(error: unknown): error is InvalidInputError {
  return isErrorType(InvalidInputError, error);
}

/**
 * Extract an {@link InvalidInputError} from an unknown error value, following nested causes.
 */
export function getInvalidInputError(error: unknown): InvalidInputError | null {
  return unwrapErrorType(InvalidInputError, error);
}
