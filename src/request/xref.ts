import type { ParseEnumError } from '../error/parseEnumError.js';
import type { SafeWrap } from '../utils/wrap.js';
import { parseLiteral } from './literal.js';

/** Cross-reference types usable as a namespace (`xref/<type>`) or operation (`xrefs/<types>`). */
export const XREFS = [
  'registryid',
  'rn',
  'pubmedid',
  'mmdbid',
  'dburl',
  'sburl',
  'proteingi',
  'nucleotidegi',
  'taxonomyid',
  'mimid',
  'geneid',
  'probeid',
  'patentid',
  'sourcename',
  'sourcecategory',
] as const;

export type XRef = (typeof XREFS)[number];

/** Parse a cross-reference type from its URL form. */
export function parseXRef(input: string): SafeWrap<ParseEnumError, XRef> {
  return parseLiteral(XREFS, input, 'XRef');
}
