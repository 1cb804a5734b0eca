import { z } from 'zod';
import { validator } from '../utils/validator.js';

/** Production API endpoint. */
export const DEFAULT_BASE_URL = 'https://docwal.com/api';

/** Default timeout in seconds. */
export const DEFAULT_TIMEOUT = 30;

/**
 * Schema of the data part of the client options.
 * Applies defaults and strips trailing slashes from the base URL.
 * The API key must fit in a header: no NUL, CR or LF, nothing beyond Latin-1.
 */
export const clientConfigSchema = z.object({
  apiKey: z
    .string()
    .min(1, 'must not be empty')
    .regex(/^[^\0\r\n\u0100-\uffff]*$/, 'must be a valid header value'),
  baseUrl: z
    .url({ protocol: /^https?$/ })
    .default(DEFAULT_BASE_URL)
    .transform((url) => url.replace(/\/+$/, '')),
  timeout: z.number().positive().default(DEFAULT_TIMEOUT),
});

/** Options as accepted by the client constructor. */
export type ClientConfigInput = z.input<typeof clientConfigSchema>;

/** Normalized configuration, immutable once the client is built. */
export type ClientConfig = Readonly<z.output<typeof clientConfigSchema>>;

/**
 * Validates and normalizes client options.
 *
 * @throws ConfigError When an option is missing or malformed.
 */
export function parseClientConfig(input: ClientConfigInput): ClientConfig {
  const [err, config] = validator(input, clientConfigSchema);
  if (err) {
    throw err;
  }

  return Object.freeze(config);
}

