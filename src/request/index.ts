/**
 * Request entrypoint: the typed vocabulary of PUG REST requests and the builder
 * that renders a specification into method, path, body and query.
 * @module
 */

export {
  AUXILIARY_DOMAINS,
  type AuxiliaryDomain,
  type Domain,
  domainSegments,
  isAuxiliaryDomain,
  PRIMARY_DOMAINS,
  type PrimaryDomain,
  parseDomain,
} from './domain.js';
export {
  type IdentifierInput,
  type Identifiers,
  identifierPieces,
  identifierValue,
  toIdentifiers,
} from './identifiers.js';
export {
  ASSAY_TARGETS,
  ASSAY_TYPES,
  type AssayNamespace,
  type AssayTarget,
  type AssayType,
  type CellNamespace,
  type CompoundNamespace,
  FAST_SEARCH_INPUTS,
  FAST_SEARCHES,
  type FastSearch,
  type FastSearchInput,
  formatNamespace,
  type GeneNamespace,
  type IdentifierShape,
  identifierShape,
  type Namespace,
  namespaceRequiresPost,
  namespaceSegments,
  type PathwayNamespace,
  type ProteinNamespace,
  parseNamespace,
  postField,
  STRUCTURE_INPUTS,
  STRUCTURE_SEARCHES,
  type StructureInput,
  type StructureSearch,
  type SubstanceNamespace,
  type TaxonomyNamespace,
} from './namespace.js';
export {
  ASSAY_TARGET_TYPES,
  type AssayOperation,
  type AssayTargetType,
  type CompoundOperation,
  defaultOperation,
  formatOperation,
  type Operation,
  operationList,
  operationSegments,
  parseOperation,
  type RawSegment,
  type SimpleOperation,
  type SubstanceOperation,
} from './operation.js';
export {
  DEFAULT_OUTPUT,
  OUTPUT_FORMATS,
  type Output,
  type OutputFormat,
  outputFormat,
  outputQuery,
  parseOutputFormat,
} from './output.js';
export { PROPERTY_TAGS, propertyAlias, resolvePropertyTag } from './properties.js';
export {
  type QueryParams,
  queryEntries,
  type RequestSpecification,
  usePost,
  validateSpecification,
} from './specification.js';
export { buildUrlParts, type RequestMethod, type ResolvedRequest, resolveUrl } from './urlBuilder.js';
export { parseXRef, type XRef, XREFS } from './xref.js';
