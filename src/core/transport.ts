import { classifyResponse } from '../error/classifyResponse.js';
import { DocWalError } from '../error/docwalError.js';
import { isTimeoutError } from '../error/timeoutError.js';
import { unwrapErrorType } from '../error/unwrapErrorType.js';
import { FetchClient } from '../fetch/client.js';
import { mergeHeaderOptions } from '../fetch/utils.js';
import type { FetchClientProvider, FetchClientProviderDefinition, FetchOptions } from '../types/request.js';
import { constructUrl } from '../utils/constructUrl.js';
import { encodeBody } from '../utils/encodeBody.js';
import { getResponseData, type ResponseParser } from '../utils/getResponseData.js';
import { createTimeoutSignal, raceSignal } from '../utils/signals.js';
import { type SafeWrapAsync, safeWrapAsync } from '../utils/wrap.js';
import type { ConnectionOptions, HttpMethod, JsonValue, Logger, RequestDescriptor } from './types.js';

/** Configuration of a {@link Transport}. */
export interface TransportOptions extends ConnectionOptions {
  /** Secret sent verbatim in the `X-API-Key` header. */
  apiKey: string;
  /** Base URL every path is appended to, without trailing slash. */
  baseUrl: string;
  /** Timeout in seconds applied to every call as a whole. */
  timeout: number;
  /** HTTP client implementation. Defaults to {@link FetchClient}. */
  fetchProvider?: FetchClientProvider;
}

/**
 * Issues one HTTP request per call and classifies the outcome.
 *
 * - Sends `X-API-Key` with every request.
 * - Encodes the payload as JSON, or as multipart when files are attached.
 * - Applies the configured timeout to the whole call.
 * - Rejects with a {@link DocWalError} kind for statuses >= 400 and for transport faults.
 *
 * Holds no mutable state, so one instance is shared by every resource of a client.
 */
export class Transport {
  /** Underlying fetch-capable HTTP provider instance. */
  #fetchClient: FetchClientProviderDefinition;
  /** Base URL, used in connection failure messages. */
  #baseUrl: string;
  /** Timeout in seconds. */
  #timeout: number;
  /** Optional lifecycle event sink. */
  #logger?: Logger;

  /**
   * Creates a transport bound to one API key and base URL.
   *
   * @param opts - Validated connection settings.
   */
  constructor({ apiKey, baseUrl, timeout, headers, logger, fetchProvider = FetchClient }: TransportOptions) {
    this.#baseUrl = baseUrl;
    this.#timeout = timeout;
    this.#logger = logger;
    this.#fetchClient = new fetchProvider(baseUrl, {
      headers: mergeHeaderOptions({ Accept: 'application/json' }, headers, { 'X-API-Key': apiKey }),
    });
  }

  /** Base URL requests are sent to. */
  get baseUrl(): string {
    return this.#baseUrl;
  }

  /** Timeout in seconds. */
  get timeout(): number {
    return this.#timeout;
  }

  /**
   * Executes a request and resolves with the parsed response body.
   *
   * @typeParam T - Shape of the parsed body, as documented by the API.
   * @param descriptor - Method, path, parameters and payload of the call.
   * @param parser - Turns a successful response into the result. Defaults to JSON, `{}` for empty bodies.
   * @throws {DocWalError} One of the error kinds on statuses >= 400, or a plain `DocWalError`
   *   without status code on timeouts and connection failures.
   */
  async execute<T = JsonValue>(descriptor: RequestDescriptor, parser: ResponseParser<T> = getResponseData): Promise<T> {
    const [err, result] = await this.#execute(descriptor, parser);
    if (err) {
      throw err;
    }

    return result;
  }

  /**
   * Core execution pipeline.
   *
   * - Builds the URL from the path template, path parameters and query.
   * - Encodes the body and runs the exchange under a timeout signal, cleared once
   *   the response has been classified or parsed.
   */
  async #execute<T>(descriptor: RequestDescriptor, parser: ResponseParser<T>): SafeWrapAsync<DocWalError, T> {
    const { method, path, params, query, json, files } = descriptor;

    const [errUrl, url] = constructUrl(path, params, query);
    if (errUrl) {
      return [new DocWalError(`Invalid request path ${path}`, { cause: errUrl }), null];
    }

    const { body, headers } = encodeBody(json, files);
    const startedAt = Date.now();
    this.#logger?.debug('http.request.start', { method, path: url });

    const timeout = createTimeoutSignal(this.#timeout);
    const [err, result] = await this.#exchange(method, url, { body, headers, signal: timeout.signal }, parser);
    timeout.clear();

    if (err) {
      this.#logger?.warn('http.request.failed', {
        method,
        path: url,
        ...(err.statusCode === undefined ? {} : { status: err.statusCode }),
        durationMs: Date.now() - startedAt,
        error: err.message,
      });
      return [err, null];
    }

    this.#logger?.debug('http.request.success', {
      method,
      path: url,
      status: result.status,
      durationMs: Date.now() - startedAt,
    });
    return [null, result.data];
  }

  /**
   * Sends the request, then classifies or parses the response.
   * Body reads race the timeout signal, so a stalled body ends as a timeout.
   */
  async #exchange<T>(
    method: HttpMethod,
    url: string,
    opts: FetchOptions & { signal: AbortSignal },
    parser: ResponseParser<T>,
  ): SafeWrapAsync<DocWalError, { status: number; data: T }> {
    const { signal } = opts;

    const [errFetch, response] = await this.#send(method, url, opts);
    if (errFetch) {
      return [this.#toTransportError(errFetch, signal.aborted), null];
    }

    if (response.status >= 400) {
      const [errRead, error] = await safeWrapAsync(() => raceSignal(classifyResponse(response), signal));
      if (errRead || signal.aborted) {
        return [this.#toTransportError(errRead ?? signal.reason, true), null];
      }
      return [error, null];
    }

    const [errRead, parsed] = await safeWrapAsync(() => raceSignal(parser(response), signal));
    if (errRead) {
      return [this.#toTransportError(errRead, signal.aborted), null];
    }

    const [errParse, data] = parsed;
    if (errParse) {
      if (signal.aborted) {
        return [this.#toTransportError(errParse, true), null];
      }
      return [new DocWalError(errParse.message, { statusCode: response.status, response, cause: errParse }), null];
    }

    return [null, { status: response.status, data }];
  }

  /** Dispatches to the provider verb matching the method. */
  #send(method: HttpMethod, url: string, opts: FetchOptions): SafeWrapAsync<Error, Response> {
    switch (method) {
      case 'GET':
        return this.#fetchClient.get(url, { headers: opts.headers, signal: opts.signal });
      case 'POST':
        return this.#fetchClient.post(url, opts);
      case 'PATCH':
        return this.#fetchClient.patch(url, opts);
      case 'DELETE':
        return this.#fetchClient.delete(url, { headers: opts.headers, signal: opts.signal });
    }
  }

  /**
   * Wraps a failure to obtain or read a response into a status-less {@link DocWalError}.
   *
   * - Timer fired: `Request timeout after N seconds`.
   * - fetch `TypeError` (DNS, refused or reset connection): `Failed to connect to <baseUrl>`.
   * - Anything else: `Request failed: <message of the underlying error>`.
   */
  #toTransportError(err: unknown, timedOut: boolean): DocWalError {
    if (timedOut || isTimeoutError(err)) {
      return new DocWalError(`Request timeout after ${this.#timeout} seconds`, { cause: err });
    }

    if (unwrapErrorType(TypeError, err)) {
      return new DocWalError(`Failed to connect to ${this.#baseUrl}`, { cause: err });
    }

    const underlying = err instanceof Error && err.cause instanceof Error ? err.cause : err;
    const message = underlying instanceof Error ? underlying.message : String(underlying);
    return new DocWalError(`Request failed: ${message}`, { cause: err });
  }
}
