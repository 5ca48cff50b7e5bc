import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error raised when a request exceeds the session timeout. Reaches the error consumer as the cause of a
 * `TransportError`.
 */
export class TimeoutError extends Error {
  /** TimeoutError error-name */
  static override name = 'TimeoutError';
  override name = 'TimeoutError';
  /** Elapsed session timeout in milliseconds */
  #timeout: number;

  /** Creates a new instance of a TimeoutError for the session timeout that elapsed */
  constructor(timeout: number, opts?: ErrorOptions) {
    super(`error request timed out after ${timeout}ms`, opts);
    this.#timeout = timeout;
  }

  /** Elapsed session timeout in milliseconds */
  get timeout(): number {
    return this.#timeout;
  }
}

/**
 * Extract a {@link TimeoutError} from an unknown error value, following nested causes.
 */
export function getTimeoutError(error: unknown): null | TimeoutError {
  return unwrapErrorType(TimeoutError, error);
}

/**
 * Type guard for {@link TimeoutError}.
 */
export function isTimeoutError(error: unknown): error is TimeoutError {
  return isErrorType(TimeoutError, error);
}
