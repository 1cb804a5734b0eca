import { DocWalError } from './docwalError.js';
import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error raised when the institution is throttled (HTTP 429).
 * The client never retries; backing off is up to the caller.
 */
export class RateLimitError extends DocWalError {
  /** RateLimitError error-name */
  static name = 'RateLimitError';
}

/**
 * Type guard for {@link RateLimitError}.
 */
export function isRateLimitError(error: unknown): error is RateLimitError {
  return isErrorType(RateLimitError, error);
}

/**
 * Extract a {@link RateLimitError} from an unknown error value, following nested causes.
 */
export function getRateLimitError(error: unknown): RateLimitError | null {
  return unwrapErrorType(RateLimitError, error);
}
