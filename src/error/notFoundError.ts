import { DocWalError } from './docwalError.js';
import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error raised when the requested credential, template or member does not exist (HTTP 404).
 */
export class NotFoundError extends DocWalError {
  /** NotFoundError error-name */
  static name = 'NotFoundError';
}

/**
 * Type guard for {@link NotFoundError}.
 */
export function isNotFoundError(error: unknown): error is NotFoundError {
  return isErrorType(NotFoundError, error);
}

/**
 * Extract a {@link NotFoundError} from an unknown error value, following nested causes.
 */
export function getNotFoundError(error: unknown): NotFoundError | null {
  return unwrapErrorType(NotFoundError, error);
}
