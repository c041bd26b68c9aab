import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error raised when a string does not name a member of one of the request vocabularies.
 */
export class ParseEnumError extends Error {
  /** ParseEnumError error-name */
  name = 'ParseEnumError';
  #input: string;
  #enumName: string;

  /** Creates a new instance of a ParseEnumError for the rejected input */
  constructor(input: string, enumName: string, opts?: ErrorOptions) {
    super(`unknown ${enumName}: '${input}'`, opts);
    this.#input = input;
    this.#enumName = enumName;
  }

  /** The string that failed to parse */
  get input(): string {
    return this.#input;
  }

  /** Vocabulary the input was parsed against, e.g. `Domain` */
  get enumName(): string {
    return this.#enumName;
  }
}

/**
 * Type guard for {@link ParseEnumError}.
 */
export function isParseEnumError(error: unknown): error is ParseEnumError {
  return isErrorType(ParseEnumError, error);
}

/**
 * Extract a {@link ParseEnumError} from an unknown error value, following nested causes.
 */
export function getParseEnumError(error: unknown): ParseEnumError | null {
  return unwrapErrorType(ParseEnumError, error);
}
