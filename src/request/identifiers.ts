import { type ErrorStrategy, errorStrategy, invalidInput } from '../error/errorStrategy.js';
import type { InvalidInputError } from '../error/invalidInputError.js';
import type { SafeWrap } from '../utils/wrap.js';

/** Canonical identifiers of a request. Lists keep their order and duplicates. */
export type Identifiers =
  | { kind: 'id'; id: number }
  | { kind: 'ids'; ids: readonly number[] }
  | { kind: 'text'; text: string };

/** Anything {@link toIdentifiers} accepts. */
export type IdentifierInput = number | readonly number[] | string | Identifiers;

function checkId(id: number, strategy: ErrorStrategy): InvalidInputError | null {
  if (!Number.isSafeInteger(id) || id <= 0) {
    return invalidInput(`identifier must be a positive integer, got ${id}`, strategy);
  }
  return null;
}

function fromIds(ids: readonly number[], strategy: ErrorStrategy): SafeWrap<InvalidInputError, Identifiers> {
  if (ids.length === 0) {
    return [invalidInput('identifier list must not be empty', strategy), null];
  }
  for (const id of ids) {
    const err = checkId(id, strategy);
    if (err) {
      return [err, null];
    }
  }
  return [null, { kind: 'ids', ids: [...ids] }];
}

/**
 * Normalize caller input into {@link Identifiers}.
 *
 * Rejects empty lists, blank strings and numbers that are not positive safe
 * integers. Existing `Identifiers` values are re-checked, so hand-built literals
 * get the same treatment.
 */
export function toIdentifiers(
  input: IdentifierInput,
  strategy: ErrorStrategy = errorStrategy(),
): SafeWrap<InvalidInputError, Identifiers> {
  if (typeof input === 'number') {
    const err = checkId(input, strategy);
    return err ? [err, null] : [null, { kind: 'id', id: input }];
  }

  if (typeof input === 'string') {
    if (input.trim() === '') {
      return [invalidInput('identifier string must not be blank', strategy), null];
    }
    return [null, { kind: 'text', text: input }];
  }

  if (!('kind' in input)) {
    return fromIds(input, strategy);
  }

  switch (input.kind) {
    case 'id':
      return toIdentifiers(input.id, strategy);
    case 'ids':
      return fromIds(input.ids, strategy);
    case 'text':
      return toIdentifiers(input.text, strategy);
  }
}

/** Unencoded pieces of the identifier value; lists yield one piece per id. */
export function identifierPieces(ids: Identifiers): string[] {
  switch (ids.kind) {
    case 'id':
      return [String(ids.id)];
    case 'ids':
      return ids.ids.map(String);
    case 'text':
      return [ids.text];
  }
}

/** Unencoded identifier value, e.g. `2244,962`. */
export function identifierValue(ids: Identifiers): string {
  return identifierPieces(ids).join(',');
}
