import { safeWrap } from './wrap.js';

/**
 * Attempts to parse a string as JSON.
 *
 * If parsing succeeds, returns the parsed value; otherwise returns the original input unchanged.
 * Never throws.
 */
export function tryParse(input: string): unknown {
  const [errParsed, parsed] = safeWrap<Error, unknown>(() => JSON.parse(input));
  if (errParsed) {
    return input;
  }

  return parsed;
}
