/**
 * Fetch entrypoint: exports the default fetch-backed transport.
 * @module
 */
export { FetchTransport, type FetchTransportOptions } from './client.js';
export { mergeHeaders } from './utils.js';
