import { tryParse } from '../utils/tryParse.js';
import { safeWrapAsync } from '../utils/wrap.js';
import { AuthenticationError } from './authenticationError.js';
import { DocWalError, type DocWalErrorOptions } from './docwalError.js';
import { NotFoundError } from './notFoundError.js';
import { PermissionError } from './permissionError.js';
import { RateLimitError } from './rateLimitError.js';
import { ValidationError } from './validationError.js';

/**
 * Reads the `error` field of a JSON error body from a clone of the response,
 * leaving the original body unread for the caller.
 *
 * Empty, unreadable or non-JSON bodies yield `null`.
 */
async function readServerMessage(response: Response): Promise<string | null> {
  const [errText, text] = await safeWrapAsync(() => response.clone().text());
  if (errText || !text) {
    return null;
  }

  const body = tryParse(text);
  if (body && typeof body === 'object' && 'error' in body && typeof body.error === 'string') {
    return body.error;
  }

  return null;
}

/**
 * Maps an error response (status >= 400) onto its error kind.
 *
 * | status | kind                  | message                               |
 * |--------|-----------------------|---------------------------------------|
 * | 401    | {@link AuthenticationError} | `Invalid API key`               |
 * | 403    | {@link PermissionError} | body `error`, else `Permission denied` |
 * | 404    | {@link NotFoundError}   | `Resource not found`                  |
 * | 429    | {@link RateLimitError}  | `Rate limit exceeded`                 |
 * | 400    | {@link ValidationError} | body `error`, else `HTTP 400`         |
 * | other  | {@link DocWalError}     | body `error`, else `HTTP <status>`    |
 *
 * Every returned error carries the status code and the response.
 */
export async function classifyResponse(response: Response): Promise<DocWalError> {
  const opts: DocWalErrorOptions = { statusCode: response.status, response };
  const serverMessage = await readServerMessage(response);

  switch (response.status) {
    case 401:
      return new AuthenticationError('Invalid API key', opts);
    case 403:
      return new PermissionError(serverMessage ?? 'Permission denied', opts);
    case 404:
      return new NotFoundError('Resource not found', opts);
    case 429:
      return new RateLimitError('Rate limit exceeded', opts);
    case 400:
      return new ValidationError(serverMessage ?? 'HTTP 400', opts);
    default:
      return new DocWalError(serverMessage ?? `HTTP ${response.status}`, opts);
  }
}
