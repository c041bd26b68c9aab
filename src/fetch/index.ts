/**
 * Fetch entrypoint: exports the fetch client and supporting types.
 * @module
 */
export { FetchClient } from './client.js';
export { FORM_CONTENT_TYPE, formHeaders, mergeHeaderOptions } from './utils.js';
