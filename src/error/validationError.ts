import type { StandardSchemaV1 } from '@standard-schema/spec';
import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Renders issues as `path: message` pairs, e.g. `rows.0: Expected number`.
 */
export function formatIssues(issues: readonly StandardSchemaV1.Issue[]): string {
  return issues
    .map(({ message, path }) => {
      const keys = (path ?? []).map((segment) => String(typeof segment === 'object' ? segment.key : segment));
      return keys.length > 0 ? `${keys.join('.')}: ${message}` : message;
    })
    .join('; ');
}

/**
 * Error representing a payload or query parameters rejected by a Standard Schema.
 */
export class ValidationError extends Error {
  /** ValidationError error-name */
  static name = 'ValidationError';
  /** Schema validation issues */
  readonly issues: StandardSchemaV1.Issue[];

  /** Creates a new instance of the ValidationError, listing the issues in its message */
  constructor(message: string, issues: StandardSchemaV1.Issue[], opts?: ErrorOptions) {
    super(issues.length > 0 ? `${message} (${formatIssues(issues)})` : message, opts);

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
 * Extract an {@link ValidationError} from an unknown error value, following nested causes.
 */
export function getValidationError(error: unknown): null | ValidationError {
  return unwrapErrorType(ValidationError, error);
}
