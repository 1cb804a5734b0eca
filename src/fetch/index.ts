/**
 * Fetch entrypoint: exports the default fetch provider and the provider contract,
 * for callers plugging in their own HTTP stack.
 * @module
 */
export { FetchClient } from './client.js';
export { mergeHeaderOptions } from './utils.js';
export type {
  FetchClientOptions,
  FetchClientProvider,
  FetchClientProviderDefinition,
  FetchOptions,
  HeaderOptions,
} from '../types/request.js';
