/**
 * Fetch entrypoint: exports the pooled fetch client and its header helpers.
 * @module
 */
export { FetchClient, type FetchClientOptions } from './client.js';
export { bearer, mergeHeaderOptions } from './utils.js';
