import { ConstructURLError } from '../error/constructUrlError.js';
import type { PathParams, QueryParams } from '../core/types.js';
import type { SafeWrap } from './wrap.js';

/**
 * Constructs a relative URL by replacing `{param}` path segments and appending query parameters.
 *
 * - Path values are URI-encoded.
 * - Query entries that are `undefined` or `null` are dropped, the rest are stringified.
 * - Fails with a {@link ConstructURLError} if a `{param}` is left unreplaced.
 *
 * @example
 * constructUrl('/credentials/{doc_id}/', { doc_id: 'd 1' }); // [null, '/credentials/d%201/']
 */
export function constructUrl(path: string, params?: PathParams, query?: QueryParams): SafeWrap<ConstructURLError, string> {
  let result = path;

  for (const [key, value] of Object.entries(params ?? {})) {
    result = result.replaceAll(`{${key}}`, encodeURIComponent(String(value)));
  }

  if (result.includes('{') || result.includes('}')) {
    return [new ConstructURLError(`error constructing URL, path contains {} ${result}`, result), null];
  }

  const searchParams = new URLSearchParams();
  for (const [key, value] of Object.entries(query ?? {})) {
    if (value === undefined || value === null) {
      continue;
    }

    searchParams.set(key, String(value));
  }

  const search = searchParams.toString();
  if (search) {
    result += `?${search}`;
  }

  return [null, result];
}
