import { isErrorType } from './isErrorType.js';

/**
 * Abort reason of the per-call timeout signal, carrying the configured duration.
 * The transport turns it into a status-less {@link DocWalError}.
 */
export class TimeoutError extends Error {
  /** TimeoutError error-name */
  static name = 'TimeoutError';
  /** Timeout that elapsed, in seconds */
  #seconds: number;

  constructor(seconds: number, opts?: ErrorOptions) {
    super(`error request timed out after ${seconds} seconds`, opts);
    this.#seconds = seconds;
  }

  /** Timeout that elapsed, in seconds */
  get seconds(): number {
    return this.#seconds;
  }
}

/**
 * Type guard for {@link TimeoutError}, following nested causes such as the fetch wrapper's.
 */
export function isTimeoutError(error: unknown): error is TimeoutError {
  return isErrorType(TimeoutError, error);
}
