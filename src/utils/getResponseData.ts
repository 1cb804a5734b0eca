import { type SafeWrapAsync, safeWrap, safeWrapAsync } from './wrap.js';

/** Turns a successful response into the value handed back to the caller. */
export type ResponseParser<T> = (response: Response) => SafeWrapAsync<Error, T>;

/**
 * Safely extracts and parses a JSON response body into a tuple-style result.
 *
 * Behavior:
 * - An empty body (including 204/205) yields an empty object.
 * - Otherwise the body text is parsed as JSON regardless of `Content-Type`.
 * - Read or parse failures are returned as `[Error, null]` with the original error as `cause`.
 */
export async function getResponseData<ReturnValue>(response: Response): SafeWrapAsync<Error, ReturnValue> {
  // Use .text as reader, since an empty body would make .json throw
  const [errText, text] = await safeWrapAsync(() => response.text());
  if (errText) {
    return [new Error('Failed to read response body', { cause: errText }), null];
  }

  const [errJson, json] = safeWrap(() => JSON.parse(text || '{}'));
  if (errJson) {
    return [new Error('Invalid JSON in response body', { cause: errJson }), null];
  }

  return [null, json];
}

/**
 * Reads the whole response body as raw bytes.
 */
export async function getResponseBytes(response: Response): SafeWrapAsync<Error, Uint8Array> {
  const [errBuffer, buffer] = await safeWrapAsync(() => response.arrayBuffer());
  if (errBuffer) {
    return [new Error('Failed to read response body', { cause: errBuffer }), null];
  }

  return [null, new Uint8Array(buffer)];
}
