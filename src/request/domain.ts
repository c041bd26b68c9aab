import type { ParseEnumError } from '../error/parseEnumError.js';
import type { SafeWrap } from '../utils/wrap.js';
import { parseLiteral } from './literal.js';

/** Resource families that are addressed through a namespace and identifiers. */
export const PRIMARY_DOMAINS = [
  'compound',
  'substance',
  'assay',
  'gene',
  'protein',
  'pathway',
  'taxonomy',
  'cell',
] as const;

/** Resource families addressed directly, without a namespace. */
export const AUXILIARY_DOMAINS = [
  'sources/substance',
  'sources/assay',
  'sourcetable',
  'conformers',
  'annotations',
  'classification',
  'standardize',
  'periodictable',
] as const;

export type PrimaryDomain = (typeof PRIMARY_DOMAINS)[number];
export type AuxiliaryDomain = (typeof AUXILIARY_DOMAINS)[number];
export type Domain = PrimaryDomain | AuxiliaryDomain;

const DOMAINS: readonly Domain[] = [...PRIMARY_DOMAINS, ...AUXILIARY_DOMAINS];

/** True for domains that take no namespace. */
export function isAuxiliaryDomain(domain: Domain): domain is AuxiliaryDomain {
  return AUXILIARY_DOMAINS.some((aux) => aux === domain);
}

/** Path segments of a domain. `sources/substance` and `sources/assay` span two. */
export function domainSegments(domain: Domain): SafeWrap<ParseEnumError, string[]> {
  const [err, parsed] = parseDomain(domain);
  if (err) {
    return [err, null];
  }
  return [null, parsed.split('/')];
}

/** Parse a domain from its `/`-joined URL form. */
export function parseDomain(input: string): SafeWrap<ParseEnumError, Domain> {
  return parseLiteral(DOMAINS, input, 'Domain');
}
