import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/** Structured fault as returned by PUG REST inside `{"Fault": {...}}`. */
export interface Fault {
  /** Machine-readable code, e.g. `PUGREST.NotFound` */
  code: string;
  /** Human-readable message */
  message: string;
  /** Extra detail lines, empty when the API sent none */
  details: string[];
}

/**
 * Error representing a structured fault returned by the API. The HTTP status may be
 * in the success range, PUG REST occasionally embeds faults in 200 responses.
 */
export class ApiFaultError extends Error {
  /** ApiFaultError error-name */
  name = 'ApiFaultError';
  /** Fault as sent by the API */
  #fault: Fault;
  /** HTTP status the fault arrived with */
  #status: number;

  /** Creates a new instance of an ApiFaultError from a parsed fault */
  constructor(fault: Fault, status: number, opts?: ErrorOptions) {
    super(`API fault: ${fault.code} - ${fault.message}`, opts);
    this.#fault = { ...fault, details: [...fault.details] };
    this.#status = status;
  }

  /** Fault code, e.g. `PUGREST.BadRequest` */
  get code(): string {
    return this.#fault.code;
  }

  /** Fault message as sent by the API, without the code prefix */
  get faultMessage(): string {
    return this.#fault.message;
  }

  /** Fault detail lines */
  get details(): readonly string[] {
    return this.#fault.details;
  }

  /** HTTP status the fault arrived with */
  get status(): number {
    return this.#status;
  }
}

/**
 * Type guard for {@link ApiFaultError}.
 */
export function isApiFaultError(error: unknown): error is ApiFaultError {
  return isErrorType(ApiFaultError, error);
}

/**
 * Extract an {@link ApiFaultError} from an unknown error value, following nested causes.
 */
export function getApiFaultError(error: unknown): ApiFaultError | null {
  return unwrapErrorType(ApiFaultError, error);
}
