import { isErrorType } from './isErrorType.js';

/**
 * Error raised when a request is intentionally aborted, either by the caller's
 * `AbortSignal` or by disposing the client.
 */
export class AbortError extends Error {
  /** AbortError error-name */
  name = 'AbortError';
}

/**
 * Type guard for {@link AbortError}. Also matches the DOM `AbortError` that `fetch`
 * rejects with, since both carry the same name.
 */
export function isAbortError(error: unknown): error is AbortError {
  return isErrorType(AbortError, error);
}
