/** Constructor of an error class, as accepted by the type guards. */
// biome-ignore lint/suspicious/noExplicitAny: errorClass needs to handle any constructor signature
export type ErrorClass<T extends Error> = new (...args: any[]) => T;

/**
 * Extract a specific error type from an unknown error value, following nested causes.
 *
 * Matches on `instanceof` first, then on the error name, so errors that crossed a
 * module boundary (duplicated package copies, structured clones) still match.
 */
export function unwrapErrorType<T extends Error>(errorClass: ErrorClass<T>, err: unknown): T | null {
  const seen = new Set<unknown>();
  let current: unknown = err;

  while (current instanceof Error && !seen.has(current)) {
    if (current instanceof errorClass) {
      return current;
    }

    if (current.name === errorClass.name) {
      return current as T;
    }

    seen.add(current);
    current = current.cause;
  }

  return null;
}
