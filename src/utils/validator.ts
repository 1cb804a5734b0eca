import type { StandardSchemaV1 } from '@standard-schema/spec';
import { ConfigError } from '../error/configError.js';
import { type SafeWrap, safeWrap } from './wrap.js';

/**
 * Validates client options against a Standard Schema (zod, valibot, ...) synchronously.
 *
 * Returns `[ConfigError, null]` when the schema throws, reports issues or only
 * validates asynchronously; `[null, value]` with the schema's output otherwise.
 */
export function validator<Output>(input: unknown, schema: StandardSchemaV1<unknown, Output>): SafeWrap<ConfigError, Output> {
  const [err, result] = safeWrap(() => schema['~standard'].validate(input));
  if (err) {
    return [new ConfigError('error validating client options', [], { cause: err }), null];
  }

  if (result instanceof Promise) {
    return [new ConfigError('error validating client options, schema must validate synchronously', []), null];
  }

  if (result.issues) {
    return [new ConfigError('invalid client options', result.issues), null];
  }

  return [null, result.value];
}
