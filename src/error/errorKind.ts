import { isAbortError } from './abortError.js';
import { isApiFaultError } from './apiFaultError.js';
import { isConstructURLError } from './constructUrlError.js';
import { isHttpError } from './httpError.js';
import { isErrorType } from './isErrorType.js';
import { isInvalidInputError } from './invalidInputError.js';
import { isParseEnumError } from './parseEnumError.js';
import { isParseResponseError } from './parseResponseError.js';
import { isRetrySuppressedError } from './retrySuppressedError.js';
import { isTimeoutError } from './timeoutError.js';
import { isValidationError } from './validationError.js';

/** Coarse failure class of an error returned by the client. */
export type ErrorKind = 'invalid-input' | 'api-fault' | 'http-status' | 'transport' | 'parse-response' | 'unknown';

/**
 * Classify an error by walking its cause chain. Retry wrappers are looked through,
 * so an exhausted retry over `503` reports `http-status`.
 */
export function errorKind(err: unknown): ErrorKind {
  // URL construction failures wrap a ParseEnumError but are internal faults.
  if (isConstructURLError(err)) {
    return 'unknown';
  }
  if (isParseResponseError(err)) {
    return 'parse-response';
  }
  if (isInvalidInputError(err) || isParseEnumError(err) || isValidationError(err)) {
    return 'invalid-input';
  }
  if (isApiFaultError(err)) {
    return 'api-fault';
  }
  if (isHttpError(err)) {
    return 'http-status';
  }
  if (isTimeoutError(err) || isAbortError(err) || isErrorType(TypeError, err) || isRetrySuppressedError(err)) {
    return 'transport';
  }
  return 'unknown';
}
