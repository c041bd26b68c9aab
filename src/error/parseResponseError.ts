import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error raised when a successful response body could not be decoded into the
 * expected shape. The decoding failure (JSON syntax or schema) is kept as `cause`.
 */
export class ParseResponseError extends Error {
  /** ParseResponseError error-name */
  name = 'ParseResponseError';
}

/**
 * Type guard for {@link ParseResponseError}.
 */
export function isParseResponseError(error: unknown): error is ParseResponseError {
  return isErrorType(ParseResponseError, error);
}

/**
 * Extract a {@link ParseResponseError} from an unknown error value, following nested causes.
 */
export function getParseResponseError(error: unknown): ParseResponseError | null {
  return unwrapErrorType(ParseResponseError, error);
}
