import { DocWalError } from './docwalError.js';
import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error raised when the API key is valid but not allowed to perform the call (HTTP 403).
 */
export class PermissionError extends DocWalError {
  /** PermissionError error-name */
  static name = 'PermissionError';
}

/**
 * Type guard for {@link PermissionError}.
 */
export function isPermissionError(error: unknown): error is PermissionError {
  return isErrorType(PermissionError, error);
}

/**
 * Extract a {@link PermissionError} from an unknown error value, following nested causes.
 */
export function getPermissionError(error: unknown): PermissionError | null {
  return unwrapErrorType(PermissionError, error);
}
