import type { FetchClientOptions, FetchClientProviderDefinition, FetchOptions } from '../types/request.js';
import { type SafeWrapAsync, safeWrapAsync } from '../utils/wrap.js';
import { mergeHeaderOptions } from './utils.js';

/**
 * Thin wrapper around the global `fetch` API that:
 * - prefixes all requests with a configured base URL,
 * - merges default and per-request headers,
 * - returns error-first tuples via {@link SafeWrapAsync}.
 *
 * Responses are returned whatever their status; only a failure to obtain one is an error.
 */
export class FetchClient implements FetchClientProviderDefinition {
  /** Base URL prepended to all request paths, without trailing slash. */
  #baseUrl: string;
  /** Default fetch options. */
  #opts: FetchClientOptions;

  /** Creates a new instance of the fetch-client, with a base-url + options */
  constructor(baseUrl: string, opts?: FetchClientOptions) {
    this.#baseUrl = baseUrl.replace(/\/+$/, '');
    this.#opts = opts ?? {};
  }

  /**
   * Executes a GET request against the given path.
   *
   * @param path - Path relative to the base URL (e.g. `/credentials/`).
   * @param opts - Request options merged with the client's defaults.
   * @returns A promise resolving to `[error, response]`.
   */
  public get(path: string, opts: Omit<FetchOptions, 'body'>): SafeWrapAsync<Error, Response> {
    return this.#request('GET', path, { ...opts, body: undefined });
  }

  /**
   * Executes a POST request against the given path.
   *
   * @param path - Path relative to the base URL.
   * @param opts - Request options, including the serialized body.
   * @returns A promise resolving to `[error, response]`.
   */
  public post(path: string, opts: FetchOptions): SafeWrapAsync<Error, Response> {
    return this.#request('POST', path, opts);
  }

  /**
   * Executes a PATCH request against the given path.
   *
   * @param path - Path relative to the base URL.
   * @param opts - Request options, including the serialized body.
   * @returns A promise resolving to `[error, response]`.
   */
  public patch(path: string, opts: FetchOptions): SafeWrapAsync<Error, Response> {
    return this.#request('PATCH', path, opts);
  }

  /**
   * Executes a DELETE request against the given path.
   *
   * @param path - Path relative to the base URL.
   * @param opts - Request options merged with the client's defaults.
   * @returns A promise resolving to `[error, response]`.
   */
  public delete(path: string, opts: Omit<FetchOptions, 'body'>): SafeWrapAsync<Error, Response> {
    return this.#request('DELETE', path, { ...opts, body: undefined });
  }

  /**
   * Core request implementation used by all HTTP verb helpers.
   *
   * Network / fetch errors (refused connections, aborts) are wrapped in `Error`
   * with the original as `cause`.
   */
  async #request(method: string, path: string, opts: FetchOptions): SafeWrapAsync<Error, Response> {
    const headers = mergeHeaderOptions(this.#opts.headers, opts.headers);

    const [err, res] = await safeWrapAsync(() =>
      fetch(this.constructPath(path), {
        body: opts.body,
        method,
        headers,
        ...(opts.signal && { signal: opts.signal }),
      }),
    );

    if (err) {
      return [new Error(`error wrapping ${method} request in fetchClient`, { cause: err }), null];
    }

    return [null, res];
  }

  /**
   * Joins the base URL and path into a single URL string.
   */
  private constructPath(path: string): string {
    return `${this.#baseUrl}${path.startsWith('/') ? path : `/${path}`}`;
  }
}
