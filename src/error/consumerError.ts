import { isErrorType } from './isErrorType.js';

/** Callback kinds a request can register. */
export type ConsumerKind = 'data' | 'string' | 'json' | 'object' | 'statusCode';

/**
 * Error raised when a registered consumer throws while handling a response.
 */
export class ConsumerError extends Error {
  /** ConsumerError error-name */
  static override name = 'ConsumerError';
  override name = 'ConsumerError';
  /** Consumer that threw */
  readonly consumer: ConsumerKind;

  /** Creates a new instance of a ConsumerError, wrapping what the consumer threw as cause */
  constructor(consumer: ConsumerKind, opts?: ErrorOptions) {
    super(`error thrown by ${consumer} consumer`, opts);
    this.consumer = consumer;
  }
}

/**
 * Type guard for {@link ConsumerError}.
 */
export function isConsumerError(error: unknown): error is ConsumerError {
  return isErrorType(ConsumerError, error);
}
