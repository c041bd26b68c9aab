import { type SafeWrap, safeWrap } from './wrap.js';

/**
 * Parses a string as JSON without throwing. Blank input is reported as an error
 * rather than handed to `JSON.parse`.
 */
export function tryParse(input: string): SafeWrap<Error, unknown> {
  if (input.trim() === '') {
    return [new SyntaxError('error parsing JSON: empty input'), null];
  }

  return safeWrap<unknown>(() => JSON.parse(input));
}
