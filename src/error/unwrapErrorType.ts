/** Any error class, regardless of its constructor arguments. */
export type ErrorClass<T extends Error> = new (...args: never[]) => T;

/**
 * Matches by `instanceof`, falling back to the class name for errors that crossed a realm or bundle boundary.
 */
function matches<T extends Error>(errorClass: ErrorClass<T>, err: Error): err is T {
  return err instanceof errorClass || err.name === errorClass.name;
}

/**
 * Extract a specific error type from an unknown error value, following nested causes.
 */
export function unwrapErrorType<T extends Error>(errorClass: ErrorClass<T>, err: unknown): T | null {
  let current: unknown = err;
  while (current instanceof Error) {
    if (matches(errorClass, current)) {
      return current;
    }
    current = current.cause;
  }

  return null;
}
