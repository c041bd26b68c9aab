import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error representing a non-success HTTP status that carried no structured fault body.
 */
export class HTTPError extends Error {
  /** HTTPError error-name */
  name = 'HTTPError';
  /** Status code of the response */
  #status: number;
  /** Raw response body, possibly empty */
  #body: string;

  /** Creates a new instance of a HTTPError with the status and body of the response */
  constructor(status: number, body: string, message = `HTTP status ${status}: ${body}`, opts?: ErrorOptions) {
    super(message, opts);
    this.#status = status;
    this.#body = body;
  }

  /** Status code of the response */
  get status(): number {
    return this.#status;
  }

  /** Raw response body */
  get body(): string {
    return this.#body;
  }
}

/**
 * Type guard for {@link HTTPError}.
 */
export function isHttpError(error: unknown): error is HTTPError {
  return isErrorType(HTTPError, error);
}

/**
 * Extract an {@link HTTPError} from an unknown error value, following nested causes.
 */
export function getHttpError(error: unknown): HTTPError | null {
  return unwrapErrorType(HTTPError, error);
}
