import type { StandardSchemaV1 } from '@standard-schema/spec';
import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/** Renders an issue as `path.to.field: message`, or just the message at the root. */
function formatIssue({ message, path }: StandardSchemaV1.Issue): string {
  if (!path || path.length === 0) {
    return message;
  }

  const segments = path.map((segment) => String(typeof segment === 'object' ? segment.key : segment));
  return `${segments.join('.')}: ${message}`;
}

/**
 * Error representing a response document rejected by a Standard Schema. Reaches the error consumer as the
 * cause of an `object` `DecodeError`.
 */
export class ValidationError extends Error {
  /** ValidationError error-name */
  static override name = 'ValidationError';
  override name = 'ValidationError';
  /** Schema validation issues */
  readonly issues: readonly StandardSchemaV1.Issue[];

  /** Creates a new instance of the ValidationError, listing the issues after the message */
  constructor(message: string, issues: readonly StandardSchemaV1.Issue[], opts?: ErrorOptions) {
    super(issues.length > 0 ? `${message}; issues: ${issues.map(formatIssue).join(', ')}` : message, opts);
    this.issues = issues;
  }
}

/**
 * Type guard for {@link ValidationError}.
 */
export function isValidationError(error: unknown): error is ValidationError {
  return isErrorType(ValidationError, error);
}

/**
 * Extract a {@link ValidationError} from an unknown error value, following nested causes.
 */
export function getValidationError(error: unknown): null | ValidationError {
  return unwrapErrorType(ValidationError, error);
}
