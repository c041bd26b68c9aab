/**
 * Core entrypoint: exports the PubChem client, its process-wide default instance
 * and the response schemas of the typed helpers.
 * @module
 */

/**
 * Client for the PubChem PUG REST service. All methods return error-first tuples
 * via {@link SafeWrapAsync} or {@link SafeWrap}.
 */
export { PubChemClient } from './client.js';

/**
 * Default client and module-level helpers that use it.
 */
export {
  getAllSources,
  getCids,
  getCompounds,
  getDefaultClient,
  getProperties,
  getSynonyms,
  setDefaultClient,
} from './default.js';

export {
  type CompoundRecord,
  compoundRecordSchema,
  compoundsResponseSchema,
  identifierListResponseSchema,
  type PropertyRow,
  propertiesResponseSchema,
  propertyRowSchema,
  type SynonymEntry,
  sourcesResponseSchema,
  synonymEntrySchema,
  synonymsResponseSchema,
} from './schemas.js';

export { type PubChemClientProps, type RawResponse, RETRY_STATUSES, type RequestOptions } from './types.js';
