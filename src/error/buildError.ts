import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Reasons a parameter tree can fail to fold.
 * - `MissingTarget`: no target node anywhere in the tree.
 * - `MultipleTargets`: more than one target node.
 * - `InvalidTarget`: the target is not an absolute URL.
 * - `InvalidParam`: a lazy parameter value threw while being evaluated.
 */
export type BuildErrorCode = 'MissingTarget' | 'MultipleTargets' | 'InvalidTarget' | 'InvalidParam';

/**
 * Error representing a malformed parameter tree. Raised at fold time, before any network activity.
 */
export class BuildError extends Error {
  /** BuildError error-name */
  static override name = 'BuildError';
  override name = 'BuildError';
  /** Which fold rule was broken */
  #code: BuildErrorCode;

  /** Creates a new instance of a BuildError with the broken fold rule */
  constructor(code: BuildErrorCode, message: string, opts?: ErrorOptions) {
    super(message, opts);
    this.#code = code;
  }

  /** Which fold rule was broken */
  get code(): BuildErrorCode {
    return this.#code;
  }
}

/**
 * Extract a {@link BuildError} from an unknown error value, following nested causes.
 */
export function getBuildError(error: unknown): null | BuildError {
  return unwrapErrorType(BuildError, error);
}

/**
 * Type guard for {@link BuildError}.
 */
export function isBuildError(error: unknown): error is BuildError {
  return isErrorType(BuildError, error);
}
