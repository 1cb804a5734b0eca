import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/** Options accepted by {@link DocWalError} and every error kind extending it. */
export interface DocWalErrorOptions extends ErrorOptions {
  /** HTTP status code of the response the error was classified from. */
  statusCode?: number;
  /** Raw response the error was classified from, with its body left unread. */
  response?: Response;
}

/**
 * Base error for every failure surfaced by the client.
 *
 * Thrown as-is for server errors without a dedicated kind and for transport faults
 * (timeouts, refused connections), in which case `statusCode` and `response` are undefined.
 */
export class DocWalError extends Error {
  /** DocWalError error-name */
  static name = 'DocWalError';
  /** Status code of the failing response */
  #statusCode?: number;
  /** Response causing the error */
  #response?: Response;

  /** Creates a new DocWalError, optionally bound to the response it was classified from */
  constructor(message: string, opts: DocWalErrorOptions = {}) {
    const { statusCode, response, ...errorOpts } = opts;
    super(message, errorOpts);
    this.name = new.target.name;
    this.#statusCode = statusCode;
    this.#response = response;
  }

  /** HTTP status code, absent for transport-level faults */
  get statusCode(): number | undefined {
    return this.#statusCode;
  }

  /** Raw response for further inspection, absent for transport-level faults */
  get response(): Response | undefined {
    return this.#response;
  }
}

/**
 * Type guard for {@link DocWalError}, matching every error kind of the client.
 */
export function isDocWalError(error: unknown): error is DocWalError {
  return isErrorType(DocWalError, error);
}

/**
 * Extract a {@link DocWalError} from an unknown error value, following nested causes.
 */
export function getDocWalError(error: unknown): DocWalError | null {
  return unwrapErrorType(DocWalError, error);
}
