/** Constructor of an error class, used to match values in a `cause` chain. */
export type ErrorClass<T extends Error> = new (...args: never[]) => T;

/**
 * Loose match for errors that crossed a realm or were re-created from a message,
 * where `instanceof` no longer holds but the class name survived.
 */
function isNamedAs<T extends Error>(errorClass: ErrorClass<T>, value: Error): value is T {
  if (!errorClass.name) {
    return false;
  }

  return value.name === errorClass.name || value.message.startsWith(errorClass.name);
}

/**
 * Extract a specific error type from an unknown error value, following nested causes.
 */
export function unwrapErrorType<T extends Error>(errorClass: ErrorClass<T>, err: unknown): T | null {
  let current: unknown = err;
  while (current instanceof Error) {
    if (current instanceof errorClass || isNamedAs(errorClass, current)) {
      return current;
    }

    current = current.cause;
  }

  return null;
}
