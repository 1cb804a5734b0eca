/**
 * Error entrypoint: exports the error kinds raised by the client and helpers for identifying and unwrapping them.
 * Use this when you only need error utilities without the client.
 * @module
 */

/** Error raised on HTTP 401. */
/** Extract an {@link AuthenticationError} from an unknown error value, following nested causes. */
/** Type guard for {@link AuthenticationError}. */
export { AuthenticationError, getAuthenticationError, isAuthenticationError } from './authenticationError.js';
/** Error thrown by the client constructor on invalid options. */
/** Type guard for {@link ConfigError}. */
export { ConfigError, isConfigError } from './configError.js';
/** Base error of every failure; also raised for transport faults and unmapped statuses. */
/** Extract a {@link DocWalError} from an unknown error value, following nested causes. */
/** Type guard for {@link DocWalError}. */
export { DocWalError, type DocWalErrorOptions, getDocWalError, isDocWalError } from './docwalError.js';
/** Generic type guard that matches an error constructor against an unknown error. */
export { isErrorType } from './isErrorType.js';
/** Error raised on HTTP 404. */
/** Extract a {@link NotFoundError} from an unknown error value, following nested causes. */
/** Type guard for {@link NotFoundError}. */
export { getNotFoundError, isNotFoundError, NotFoundError } from './notFoundError.js';
/** Error raised on HTTP 403. */
/** Extract a {@link PermissionError} from an unknown error value, following nested causes. */
/** Type guard for {@link PermissionError}. */
export { getPermissionError, isPermissionError, PermissionError } from './permissionError.js';
/** Error raised on HTTP 429. */
/** Extract a {@link RateLimitError} from an unknown error value, following nested causes. */
/** Type guard for {@link RateLimitError}. */
export { getRateLimitError, isRateLimitError, RateLimitError } from './rateLimitError.js';
/** Recursively unwraps nested causes to find a specific error class. */
export { type ErrorClass, unwrapErrorType } from './unwrapErrorType.js';
/** Error raised on HTTP 400. */
/** Extract a {@link ValidationError} from an unknown error value, following nested causes. */
/** Type guard for {@link ValidationError}. */
export { getValidationError, isValidationError, ValidationError } from './validationError.js';
