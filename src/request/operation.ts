import { ParseEnumError } from '../error/parseEnumError.js';
import type { SafeWrap } from '../utils/wrap.js';
import type { Domain } from './domain.js';
import { parseLiteral, splitHead } from './literal.js';
import { resolvePropertyTag } from './properties.js';
import { parseXRef, type XRef } from './xref.js';

const COMPOUND_OPS = [
  'record',
  'synonyms',
  'sids',
  'cids',
  'aids',
  'assaysummary',
  'classification',
  'description',
  'conformers',
] as const;
const SUBSTANCE_OPS = [
  'record',
  'synonyms',
  'sids',
  'cids',
  'aids',
  'assaysummary',
  'classification',
  'description',
] as const;
const ASSAY_OPS = [
  'record',
  'concise',
  'aids',
  'cids',
  'sids',
  'description',
  'summary',
  'classification',
  'doseresponse',
] as const;
const GENE_OPS = ['summary', 'aids', 'concise', 'pwaccs'] as const;
const PATHWAY_OPS = ['summary', 'cids', 'concise', 'pwaccs'] as const;
const TAXONOMY_OPS = ['summary', 'aids'] as const;

export const ASSAY_TARGET_TYPES = ['proteingi', 'proteinname', 'geneid', 'genesymbol'] as const;
export type AssayTargetType = (typeof ASSAY_TARGET_TYPES)[number];

export type CompoundOperation =
  | { domain: 'compound'; kind: (typeof COMPOUND_OPS)[number] }
  | { domain: 'compound'; kind: 'property'; tags: readonly string[] }
  | { domain: 'compound'; kind: 'xrefs'; xrefs: readonly XRef[] };

export type SubstanceOperation =
  | { domain: 'substance'; kind: (typeof SUBSTANCE_OPS)[number] }
  | { domain: 'substance'; kind: 'xrefs'; xrefs: readonly XRef[] };

export type AssayOperation =
  | { domain: 'assay'; kind: (typeof ASSAY_OPS)[number] }
  | { domain: 'assay'; kind: 'targets'; targetType: AssayTargetType };

export type SimpleOperation =
  | { domain: 'gene' | 'protein'; kind: (typeof GENE_OPS)[number] }
  | { domain: 'pathway'; kind: (typeof PATHWAY_OPS)[number] }
  | { domain: 'taxonomy' | 'cell'; kind: (typeof TAXONOMY_OPS)[number] };

/** What to retrieve for the matched records. Tagged with the domain it belongs to. */
export type Operation = CompoundOperation | SubstanceOperation | AssayOperation | SimpleOperation;

/**
 * One rendered path piece: a plain segment, or a list that is comma-joined after
 * each element is encoded.
 */
export type RawSegment = string | readonly string[];

/** Path segments of an operation, unencoded. Property tags are resolved to their API names. */
export function operationSegments(op: Operation): RawSegment[] {
  switch (op.kind) {
    case 'property':
      return ['property', op.tags.map(resolvePropertyTag)];
    case 'xrefs':
      return ['xrefs', op.xrefs];
    case 'targets':
      return ['targets', op.targetType];
    case 'doseresponse':
      return ['doseresponse', 'sid'];
    default:
      return [op.kind];
  }
}

/** The `/`-joined form accepted by {@link parseOperation}. */
export function formatOperation(op: Operation): string {
  return operationSegments(op)
    .map((segment) => (typeof segment === 'string' ? segment : segment.join(',')))
    .join('/');
}

/** The operation used when a specification names none; `null` for auxiliary domains. */
export function defaultOperation(domain: Domain): Operation | null {
  switch (domain) {
    case 'compound':
    case 'substance':
    case 'assay':
      return { domain, kind: 'record' };
    case 'gene':
    case 'protein':
    case 'pathway':
    case 'taxonomy':
    case 'cell':
      return { domain, kind: 'summary' };
    default:
      return null;
  }
}

function parseList<T>(
  rest: string,
  enumName: string,
  parseItem: (item: string) => SafeWrap<ParseEnumError, T>,
): SafeWrap<ParseEnumError, T[]> {
  const items: T[] = [];
  for (const raw of rest.split(',')) {
    if (raw === '') {
      return [new ParseEnumError(rest, enumName), null];
    }
    const [err, item] = parseItem(raw);
    if (err) {
      return [err, null];
    }
    items.push(item);
  }
  return [null, items];
}

function parseXRefList(rest: string): SafeWrap<ParseEnumError, XRef[]> {
  return parseList(rest, 'XRefs', parseXRef);
}

function parseTags(rest: string): SafeWrap<ParseEnumError, string[]> {
  return parseList<string>(rest, 'PropertyTags', (tag) => [null, resolvePropertyTag(tag)]);
}

/**
 * Parse an operation of `domain` from its `/`-joined form, e.g.
 * `property/MolecularWeight,XLogP`. Auxiliary domains take no operation.
 */
export function parseOperation(domain: Domain, input: string): SafeWrap<ParseEnumError, Operation> {
  const [head, rest] = splitHead(input);

  switch (domain) {
    case 'compound': {
      if (head === 'property' && rest !== null) {
        const [err, tags] = parseTags(rest);
        return err ? [err, null] : [null, { domain, kind: 'property', tags }];
      }
      if (head === 'xrefs' && rest !== null) {
        const [err, xrefs] = parseXRefList(rest);
        return err ? [err, null] : [null, { domain, kind: 'xrefs', xrefs }];
      }
      const [err, kind] = parseLiteral(COMPOUND_OPS, input, 'CompoundOperation');
      return err ? [err, null] : [null, { domain, kind }];
    }
    case 'substance': {
      if (head === 'xrefs' && rest !== null) {
        const [err, xrefs] = parseXRefList(rest);
        return err ? [err, null] : [null, { domain, kind: 'xrefs', xrefs }];
      }
      const [err, kind] = parseLiteral(SUBSTANCE_OPS, input, 'SubstanceOperation');
      return err ? [err, null] : [null, { domain, kind }];
    }
    case 'assay': {
      if (head === 'targets' && rest !== null) {
        const [err, targetType] = parseLiteral(ASSAY_TARGET_TYPES, rest, 'AssayTargetType');
        return err ? [err, null] : [null, { domain, kind: 'targets', targetType }];
      }
      if (input === 'doseresponse/sid') {
        return [null, { domain, kind: 'doseresponse' }];
      }
      // bare `doseresponse` is not a valid path
      const [err, kind] = parseLiteral(
        ASSAY_OPS.filter((op) => op !== 'doseresponse'),
        input,
        'AssayOperation',
      );
      return err ? [err, null] : [null, { domain, kind }];
    }
    case 'gene':
    case 'protein': {
      const [err, kind] = parseLiteral(GENE_OPS, input, 'GeneOperation');
      return err ? [err, null] : [null, { domain, kind }];
    }
    case 'pathway': {
      const [err, kind] = parseLiteral(PATHWAY_OPS, input, 'PathwayOperation');
      return err ? [err, null] : [null, { domain, kind }];
    }
    case 'taxonomy':
    case 'cell': {
      const [err, kind] = parseLiteral(TAXONOMY_OPS, input, 'TaxonomyOperation');
      return err ? [err, null] : [null, { domain, kind }];
    }
    default:
      return [new ParseEnumError(input, 'Operation'), null];
  }
}

/** Property tags or xref types carried by the operation, or `null` when it takes none. */
export function operationList(op: Operation): readonly string[] | null {
  switch (op.kind) {
    case 'property':
      return op.tags;
    case 'xrefs':
      return op.xrefs;
    default:
      return null;
  }
}
