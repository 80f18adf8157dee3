/**
 * Fetch entrypoint: exports the default undici-based transport.
 * @module
 */
export { FetchTransport } from './client.js';
export { mergeHeaderOptions } from './utils.js';
