/**
 * Fetch entrypoint: exports the default fetch provider and its options.
 * @module
 */
export { FetchClient, type FetchClientOptions } from './client.js';
export { mergeHeaderOptions } from './utils.js';
