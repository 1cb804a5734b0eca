/**
 * Root entrypoint for the DocWal SDK: re-exports the client, resources, types and error utilities.
 * Use this import if you want everything from a single module surface.
 * @module
 */

export * from './core/index.js';
export * from './error/index.js';
export * from './resources/index.js';

/**
 * Default `fetch` based HTTP provider, and the contract for custom ones.
 */
export {
  FetchClient,
  type FetchClientOptions,
  type FetchClientProvider,
  type FetchClientProviderDefinition,
  type FetchOptions,
  type HeaderOptions,
} from './fetch/index.js';

/** Tuple-based results used by providers and parsers. */
export type { SafeWrap, SafeWrapAsync } from './utils/wrap.js';
/** Parser signature accepted by {@link Transport.execute}, plus the built-in JSON and bytes parsers. */
export { getResponseBytes, getResponseData, type ResponseParser } from './utils/getResponseData.js';
