import { DocWalError } from './docwalError.js';
import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error raised when the server rejects the request payload (HTTP 400).
 * The message is the server's `error` field when it sends one.
 */
export class ValidationError extends DocWalError {
  /** ValidationError error-name */
  static name = 'ValidationError';
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
export function getValidationError(error: unknown): ValidationError | null {
  return unwrapErrorType(ValidationError, error);
}
