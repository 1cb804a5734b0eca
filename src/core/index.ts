/**
 * Core entrypoint: exports the client, its transport and the request/JSON types.
 * Import from here if you only need the client without error helpers.
 * @module
 */

/**
 * Constructor options accepted by {@link DocWalClient}.
 */
export type { DocWalClientProps } from './client.js';

/**
 * Client for the DocWal credentialing API, owning one instance of each resource.
 */
export { DocWalClient } from './client.js';

/** Defaults applied to omitted client options. */
export { DEFAULT_BASE_URL, DEFAULT_TIMEOUT } from './config.js';

/**
 * Request executor shared by the resources, for calling endpoints the resources do not cover.
 */
export { Transport, type TransportOptions } from './transport.js';

export type {
  FileContent,
  FilePart,
  HttpMethod,
  JsonObject,
  JsonPrimitive,
  JsonValue,
  Logger,
  NamedFile,
  PathParams,
  QueryParams,
  RequestDescriptor,
} from './types.js';
