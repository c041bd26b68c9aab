/**
 * Error entrypoint: exports the typed errors of the client and helpers for
 * identifying, unwrapping and classifying them.
 * @module
 */

export { AbortError, isAbortError } from './abortError.js';
export { ApiFaultError, type Fault, getApiFaultError, isApiFaultError } from './apiFaultError.js';
export { ConstructURLError, getConstructURLError, isConstructURLError } from './constructUrlError.js';
export { type ErrorKind, errorKind } from './errorKind.js';
export {
  type ErrorStrategy,
  type ErrorStrategyEnv,
  errorStrategy,
  invalidInput,
  parseResponse,
  resolveErrorStrategy,
} from './errorStrategy.js';
export { getHttpError, HTTPError, isHttpError } from './httpError.js';
export { getInvalidInputError, InvalidInputError, isInvalidInputError } from './invalidInputError.js';
export { isErrorType } from './isErrorType.js';
export { getParseEnumError, isParseEnumError, ParseEnumError } from './parseEnumError.js';
export { getParseResponseError, isParseResponseError, ParseResponseError } from './parseResponseError.js';
export { getRetryExhaustedError, isRetryExhaustedError, RetryExhaustedError } from './retryExhaustedError.js';
export { getRetrySuppressedError, isRetrySuppressedError, RetrySuppressedError } from './retrySuppressedError.js';
export { isTimeoutError, TimeoutError } from './timeoutError.js';
export { type ErrorClass, unwrapErrorType } from './unwrapErrorType.js';
export { getValidationError, isValidationError, ValidationError } from './validationError.js';
