import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/** Consumer whose decoding failed. */
export type DecodeKind = 'json' | 'object';

/**
 * Error representing a response body that could not be decoded for one consumer.
 * Other consumers of the same response are unaffected.
 */
export class DecodeError extends Error {
  /** DecodeError error-name */
  static override name = 'DecodeError';
  override name = 'DecodeError';
  /** Consumer the body was decoded for */
  #kind: DecodeKind;

  /** Creates a new instance of a DecodeError for the given consumer kind */
  constructor(kind: DecodeKind, message: string, opts?: ErrorOptions) {
    super(message, opts);
    this.#kind = kind;
  }

  /** Consumer the body was decoded for */
  get kind(): DecodeKind {
    return this.#kind;
  }
}

/**
 * Extract a {@link DecodeError} from an unknown error value, following nested causes.
 */
export function getDecodeError(error: unknown): null | DecodeError {
  return unwrapErrorType(DecodeError, error);
}

/**
 * Type guard for {@link DecodeError}.
 */
export function isDecodeError(error: unknown): error is DecodeError {
  return isErrorType(DecodeError, error);
}
