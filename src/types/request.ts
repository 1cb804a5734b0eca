import type { SafeWrapAsync } from '../utils/wrap.js';

/** Header options accepted by the fetch wrapper. A `null`/`undefined` value removes the header. */
export type HeaderOptions = NonNullable<RequestInit['headers']> | Record<string, string | null | undefined>;

/** Options to pass in for each fetch request */
export interface FetchOptions {
  /** Serialized body, JSON text or `FormData`. */
  body?: RequestInit['body'];
  /** Headers merged with provider defaults. */
  headers?: HeaderOptions;
  /** Abort signal to cancel the request. */
  signal?: AbortSignal;
}

/** Options to configure a fetch provider. */
export interface FetchClientOptions {
  /** Default headers sent with every request. */
  headers?: HeaderOptions;
}

/**
 * Contract for HTTP client implementations used by the transport.
 *
 * Providers only report failures to get a response at all; any response,
 * whatever its status, is returned for the transport to classify.
 */
export interface FetchClientProviderDefinition {
  /** Executes a GET request. */
  get: (path: string, options: Omit<FetchOptions, 'body'>) => SafeWrapAsync<Error, Response>;
  /** Executes a POST request. */
  post: (path: string, options: FetchOptions) => SafeWrapAsync<Error, Response>;
  /** Executes a PATCH request. */
  patch: (path: string, options: FetchOptions) => SafeWrapAsync<Error, Response>;
  /** Executes a DELETE request. */
  delete: (path: string, options: Omit<FetchOptions, 'body'>) => SafeWrapAsync<Error, Response>;
}

/** Factory signature for constructing HTTP providers. */
export interface FetchClientProvider {
  /** Creates a new provider for a base URL (without trailing slash) and default options */
  new (baseUrl: string, opts: FetchClientOptions): FetchClientProviderDefinition;
}
