import { DocWalError } from './docwalError.js';
import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error raised when the API key is rejected (HTTP 401).
 */
export class AuthenticationError extends DocWalError {
  /** AuthenticationError error-name */
  static name = 'AuthenticationError';
}

/**
 * Type guard for {@link AuthenticationError}.
 */
export function isAuthenticationError(error: unknown): error is AuthenticationError {
  return isErrorType(AuthenticationError, error);
}

/**
 * Extract an {@link AuthenticationError} from an unknown error value, following nested causes.
 */
export function getAuthenticationError(error: unknown): AuthenticationError | null {
  return unwrapErrorType(AuthenticationError, error);
}
