/**
 * Error entrypoint: exports the typed pipeline errors and helpers for identifying and unwrapping them.
 * Use this when you only need error utilities without the request.
 * @module
 */

/** Error raised when a caller-supplied session signal aborts without a reason. */
/** Type guard that checks if an error is an {@link AbortError}. */
export { AbortError, isAbortError } from './abortError.js';
/** Error representing a parameter tree that failed to fold. */
/** Extract a {@link BuildError} from an unknown error value, following nested causes. */
/** Type guard for {@link BuildError}. */
export { BuildError, type BuildErrorCode, getBuildError, isBuildError } from './buildError.js';
/** Error raised when a registered consumer throws. */
/** Type guard for {@link ConsumerError}. */
export { ConsumerError, type ConsumerKind, isConsumerError } from './consumerError.js';
/** Error representing a body that could not be decoded for one consumer. */
/** Extract a {@link DecodeError} from an unknown error value, following nested causes. */
/** Type guard for {@link DecodeError}. */
export { DecodeError, type DecodeKind, getDecodeError, isDecodeError } from './decodeError.js';
/** Generic type guard that matches an error constructor against an unknown error. */
export { isErrorType } from './isErrorType.js';
/** Type guard that checks if an error is a {@link TimeoutError}. */
/** Error raised when a request exceeds the session timeout. */
export { getTimeoutError, isTimeoutError, TimeoutError } from './timeoutError.js';
/** Error representing a failed network call. */
/** Extract a {@link TransportError} from an unknown error value, following nested causes. */
/** Type guard for {@link TransportError}. */
export { getTransportError, isTransportError, TransportError } from './transportError.js';
/** Recursively unwraps nested causes to find a specific error class. */
export { type ErrorClass, unwrapErrorType } from './unwrapErrorType.js';
/** Extracts a {@link ValidationError} from an unknown error value. */
/** Type guard that checks if an error is a {@link ValidationError}. */
/** Error thrown when validation of a response document fails. */
export { getValidationError, isValidationError, ValidationError } from './validationError.js';
