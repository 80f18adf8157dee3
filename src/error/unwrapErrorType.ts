/** Constructor of an error class, used for matching along `cause` chains. */
export type ErrorClass<T extends Error> = abstract new (...args: never[]) => T;

/**
 * Extract a specific error type from an unknown error value, following nested causes.
 * Stops on the first non-error `cause` or when a chain loops back on itself.
 */
export function unwrapErrorType<T extends Error>(errorClass: ErrorClass<T>, err: unknown, shallow = false): T | null {
  const seen = new Set<Error>();
  let current: unknown = err;

  while (current instanceof Error && !seen.has(current)) {
    if (current instanceof errorClass) {
      return current;
    }

    if (shallow) {
      return null;
    }

    seen.add(current);
    current = current.cause;
  }

  return null;
}
