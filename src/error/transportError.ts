import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error representing a failed network call: connection failure, timeout, or a transport that threw.
 * HTTP error statuses are not transport errors; they reach the status-code consumer.
 */
export class TransportError extends Error {
  /** TransportError error-name */
  static override name = 'TransportError';
  override name = 'TransportError';
  /** Target the request was sent to */
  #target: string;

  /** Creates a new instance of a TransportError for the given target */
  constructor(message: string, target: string, opts?: ErrorOptions) {
    super(message, opts);
    this.#target = target;
  }

  /** Target the request was sent to */
  get target(): string {
    return this.#target;
  }
}

/**
 * Extract a {@link TransportError} from an unknown error value, following nested causes.
 */
export function getTransportError(error: unknown): null | TransportError {
  return unwrapErrorType(TransportError, error);
}

/**
 * Type guard for {@link TransportError}.
 */
export function isTransportError(error: unknown): error is TransportError {
  return isErrorType(TransportError, error);
}
