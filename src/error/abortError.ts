import { isErrorType } from './isErrorType.js';

/**
 * Error raised when a caller-supplied session signal aborts a request without a reason of its own.
 */
export class AbortError extends Error {
  /** AbortError error-name */
  static override name = 'AbortError';
  override name = 'AbortError';
}

/**
 * Type guard for {@link AbortError}.
 */
export function isAbortError(error: unknown): error is AbortError {
  return isErrorType(AbortError, error);
}
