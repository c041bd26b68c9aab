import { ParseEnumError } from '../error/parseEnumError.js';
import type { SafeWrap } from '../utils/wrap.js';
import type { PrimaryDomain } from './domain.js';
import { parseLiteral, splitHead } from './literal.js';
import { parseXRef, type XRef } from './xref.js';

export const STRUCTURE_SEARCHES = ['substructure', 'superstructure', 'similarity', 'identity'] as const;
export const STRUCTURE_INPUTS = ['smiles', 'inchi', 'sdf', 'cid'] as const;
export const FAST_SEARCHES = [
  'fastidentity',
  'fastsimilarity_2d',
  'fastsimilarity_3d',
  'fastsubstructure',
  'fastsuperstructure',
] as const;
export const FAST_SEARCH_INPUTS = ['smiles', 'smarts', 'inchi', 'sdf', 'cid'] as const;
export const ASSAY_TYPES = [
  'all',
  'confirmatory',
  'doseresponse',
  'onhold',
  'panel',
  'rnai',
  'screening',
  'summary',
  'cellbased',
  'biochemical',
  'invivo',
  'invitro',
  'activeconcentrationspecified',
] as const;
export const ASSAY_TARGETS = ['gi', 'proteinname', 'geneid', 'genesymbol', 'accession'] as const;

export type StructureSearch = (typeof STRUCTURE_SEARCHES)[number];
export type StructureInput = (typeof STRUCTURE_INPUTS)[number];
export type FastSearch = (typeof FAST_SEARCHES)[number];
export type FastSearchInput = (typeof FAST_SEARCH_INPUTS)[number];
export type AssayType = (typeof ASSAY_TYPES)[number];
export type AssayTarget = (typeof ASSAY_TARGETS)[number];

const COMPOUND_KINDS = ['cid', 'name', 'smiles', 'inchi', 'sdf', 'inchikey', 'formula', 'mass', 'listkey'] as const;
const SUBSTANCE_KINDS = ['sid', 'name', 'listkey'] as const;
const ASSAY_KINDS = ['aid', 'listkey'] as const;
const GENE_KINDS = ['geneid', 'genesymbol', 'synonym'] as const;
const PROTEIN_KINDS = ['accession', 'gi', 'synonym'] as const;
const PATHWAY_KINDS = ['pwacc'] as const;
const TAXONOMY_KINDS = ['taxid', 'synonym'] as const;
const CELL_KINDS = ['cellacc', 'synonym'] as const;

export type CompoundNamespace =
  | { domain: 'compound'; kind: (typeof COMPOUND_KINDS)[number] }
  | { domain: 'compound'; kind: 'xref'; xref: XRef }
  | { domain: 'compound'; kind: 'structure'; search: StructureSearch; input: StructureInput }
  | { domain: 'compound'; kind: 'fastsearch'; search: FastSearch; input: FastSearchInput }
  | { domain: 'compound'; kind: 'fastformula' };

export type SubstanceNamespace =
  | { domain: 'substance'; kind: (typeof SUBSTANCE_KINDS)[number] }
  | { domain: 'substance'; kind: 'sourceid' | 'sourceall'; source: string }
  | { domain: 'substance'; kind: 'xref'; xref: XRef };

export type AssayNamespace =
  | { domain: 'assay'; kind: (typeof ASSAY_KINDS)[number] }
  | { domain: 'assay'; kind: 'type'; assayType: AssayType }
  | { domain: 'assay'; kind: 'sourceall'; source: string }
  | { domain: 'assay'; kind: 'target'; target: AssayTarget }
  | { domain: 'assay'; kind: 'activity'; column: string };

export type GeneNamespace = { domain: 'gene'; kind: (typeof GENE_KINDS)[number] };
export type ProteinNamespace = { domain: 'protein'; kind: (typeof PROTEIN_KINDS)[number] };
export type PathwayNamespace = { domain: 'pathway'; kind: (typeof PATHWAY_KINDS)[number] };
export type TaxonomyNamespace = { domain: 'taxonomy'; kind: (typeof TAXONOMY_KINDS)[number] };
export type CellNamespace = { domain: 'cell'; kind: (typeof CELL_KINDS)[number] };

/** How identifiers are interpreted, per domain. */
export type Namespace =
  | CompoundNamespace
  | SubstanceNamespace
  | AssayNamespace
  | GeneNamespace
  | ProteinNamespace
  | PathwayNamespace
  | TaxonomyNamespace
  | CellNamespace;

/**
 * Which identifier variants a namespace accepts:
 * - `numeric`: one or more integer ids
 * - `single-numeric`: exactly one integer id
 * - `text`: a string payload
 * - `any`: no restriction
 */
export type IdentifierShape = 'numeric' | 'single-numeric' | 'text' | 'any';

/** Path segments of a namespace, unencoded. */
export function namespaceSegments(ns: Namespace): string[] {
  switch (ns.kind) {
    case 'xref':
      return ['xref', ns.xref];
    case 'structure':
    case 'fastsearch':
      return [ns.search, ns.input];
    case 'sourceid':
    case 'sourceall':
      return [ns.kind, ns.source];
    case 'type':
      return ['type', ns.assayType];
    case 'target':
      return ['target', ns.target];
    case 'activity':
      return ['activity', ns.column];
    default:
      return [ns.kind];
  }
}

/** The `/`-joined form accepted by {@link parseNamespace}. */
export function formatNamespace(ns: Namespace): string {
  return namespaceSegments(ns).join('/');
}

/**
 * Whether requests under this namespace go out as POST with the identifier in a
 * form body. Decided by the kind alone, never by identifier size.
 */
export function namespaceRequiresPost(ns: Namespace): boolean {
  switch (ns.domain) {
    case 'compound':
      switch (ns.kind) {
        case 'smiles':
        case 'inchi':
        case 'sdf':
        case 'formula':
        case 'listkey':
        case 'xref':
        case 'structure':
        case 'fastsearch':
        case 'fastformula':
          return true;
        default:
          return false;
      }
    case 'substance':
      return ns.kind === 'sourceid' || ns.kind === 'listkey' || ns.kind === 'xref';
    default:
      return false;
  }
}

/** Form field carrying the identifier in a POST body. */
export function postField(ns: Namespace): string {
  switch (ns.kind) {
    case 'structure':
    case 'fastsearch':
      return ns.input;
    case 'fastformula':
      return 'formula';
    case 'xref':
      return ns.xref;
    default:
      return ns.kind;
  }
}

/** Identifier variants accepted under `ns`. */
export function identifierShape(ns: Namespace): IdentifierShape {
  switch (ns.kind) {
    case 'cid':
    case 'sid':
    case 'aid':
    case 'geneid':
    case 'taxid':
    case 'gi':
      return 'numeric';
    case 'structure':
    case 'fastsearch':
      return ns.input === 'cid' ? 'single-numeric' : 'text';
    case 'smiles':
    case 'inchi':
    case 'sdf':
    case 'inchikey':
    case 'formula':
    case 'fastformula':
    case 'listkey':
    case 'name':
    case 'synonym':
    case 'genesymbol':
      return 'text';
    default:
      return 'any';
  }
}

function parseCompoundNamespace(input: string): SafeWrap<ParseEnumError, CompoundNamespace> {
  const [head, rest] = splitHead(input);
  if (rest === null) {
    if (head === 'fastformula') {
      return [null, { domain: 'compound', kind: 'fastformula' }];
    }
    const [err, kind] = parseLiteral(COMPOUND_KINDS, head, 'CompoundNamespace');
    return err ? [err, null] : [null, { domain: 'compound', kind }];
  }

  if (head === 'xref') {
    const [err, xref] = parseXRef(rest);
    return err ? [err, null] : [null, { domain: 'compound', kind: 'xref', xref }];
  }

  const [, search] = parseLiteral(STRUCTURE_SEARCHES, head, 'StructureSearch');
  if (search) {
    const [err, structureInput] = parseLiteral(STRUCTURE_INPUTS, rest, 'StructureInput');
    return err ? [err, null] : [null, { domain: 'compound', kind: 'structure', search, input: structureInput }];
  }

  const [, fast] = parseLiteral(FAST_SEARCHES, head, 'FastSearch');
  if (fast) {
    const [err, fastInput] = parseLiteral(FAST_SEARCH_INPUTS, rest, 'FastSearchInput');
    return err ? [err, null] : [null, { domain: 'compound', kind: 'fastsearch', search: fast, input: fastInput }];
  }

  return [new ParseEnumError(input, 'CompoundNamespace'), null];
}

function parseSubstanceNamespace(input: string): SafeWrap<ParseEnumError, SubstanceNamespace> {
  const [head, rest] = splitHead(input);
  if (rest === null) {
    const [err, kind] = parseLiteral(SUBSTANCE_KINDS, head, 'SubstanceNamespace');
    return err ? [err, null] : [null, { domain: 'substance', kind }];
  }

  if ((head === 'sourceid' || head === 'sourceall') && rest !== '') {
    return [null, { domain: 'substance', kind: head, source: rest }];
  }
  if (head === 'xref') {
    const [err, xref] = parseXRef(rest);
    return err ? [err, null] : [null, { domain: 'substance', kind: 'xref', xref }];
  }

  return [new ParseEnumError(input, 'SubstanceNamespace'), null];
}

function parseAssayNamespace(input: string): SafeWrap<ParseEnumError, AssayNamespace> {
  const [head, rest] = splitHead(input);
  if (rest === null) {
    const [err, kind] = parseLiteral(ASSAY_KINDS, head, 'AssayNamespace');
    return err ? [err, null] : [null, { domain: 'assay', kind }];
  }

  switch (head) {
    case 'type': {
      const [err, assayType] = parseLiteral(ASSAY_TYPES, rest, 'AssayType');
      return err ? [err, null] : [null, { domain: 'assay', kind: 'type', assayType }];
    }
    case 'target': {
      const [err, target] = parseLiteral(ASSAY_TARGETS, rest, 'AssayTarget');
      return err ? [err, null] : [null, { domain: 'assay', kind: 'target', target }];
    }
    case 'sourceall':
      if (rest !== '') {
        return [null, { domain: 'assay', kind: 'sourceall', source: rest }];
      }
      break;
    case 'activity':
      if (rest !== '') {
        return [null, { domain: 'assay', kind: 'activity', column: rest }];
      }
      break;
  }

  return [new ParseEnumError(input, 'AssayNamespace'), null];
}

/** Parse a namespace of `domain` from its `/`-joined form, e.g. `substructure/smiles`. */
export function parseNamespace(domain: PrimaryDomain, input: string): SafeWrap<ParseEnumError, Namespace> {
  switch (domain) {
    case 'compound':
      return parseCompoundNamespace(input);
    case 'substance':
      return parseSubstanceNamespace(input);
    case 'assay':
      return parseAssayNamespace(input);
    case 'gene': {
      const [err, kind] = parseLiteral(GENE_KINDS, input, 'GeneNamespace');
      return err ? [err, null] : [null, { domain, kind }];
    }
    case 'protein': {
      const [err, kind] = parseLiteral(PROTEIN_KINDS, input, 'ProteinNamespace');
      return err ? [err, null] : [null, { domain, kind }];
    }
    case 'pathway': {
      const [err, kind] = parseLiteral(PATHWAY_KINDS, input, 'PathwayNamespace');
      return err ? [err, null] : [null, { domain, kind }];
    }
    case 'taxonomy': {
      const [err, kind] = parseLiteral(TAXONOMY_KINDS, input, 'TaxonomyNamespace');
      return err ? [err, null] : [null, { domain, kind }];
    }
    case 'cell': {
      const [err, kind] = parseLiteral(CELL_KINDS, input, 'CellNamespace');
      return err ? [err, null] : [null, { domain, kind }];
    }
  }
}
