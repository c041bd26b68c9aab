import { ParseEnumError } from '../error/parseEnumError.js';
import type { SafeWrap } from '../utils/wrap.js';

/**
 * Parse `input` as one of `values`, matching exactly (case-sensitive).
 *
 * @param enumName - vocabulary name reported in the {@link ParseEnumError}
 */
export function parseLiteral<T extends string>(
  values: readonly T[],
  input: string,
  enumName: string,
): SafeWrap<ParseEnumError, T> {
  const found = values.find((value) => value === input);
  if (found === undefined) {
    return [new ParseEnumError(input, enumName), null];
  }
  return [null, found];
}

/** Split `input` at its first `/` into head and the (possibly empty) rest. */
export function splitHead(input: string): [head: string, rest: string | null] {
  const idx = input.indexOf('/');
  if (idx === -1) {
    return [input, null];
  }
  return [input.slice(0, idx), input.slice(idx + 1)];
}
