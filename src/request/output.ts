import type { ParseEnumError } from '../error/parseEnumError.js';
import type { SafeWrap } from '../utils/wrap.js';
import { parseLiteral } from './literal.js';

export const OUTPUT_FORMATS = ['XML', 'ASNT', 'ASNB', 'JSON', 'JSONP', 'SDF', 'CSV', 'PNG', 'TXT'] as const;

/** Response encoding, rendered as the final path segment. */
export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

/** Output of a request: a bare format, or JSONP with the callback function name. */
export type Output = OutputFormat | { format: 'JSONP'; callback: string };

export const DEFAULT_OUTPUT: OutputFormat = 'JSON';

/** Format segment of an output. */
export function outputFormat(output: Output): OutputFormat {
  return typeof output === 'string' ? output : output.format;
}

/** Query parameters an output adds; only a JSONP callback does. */
export function outputQuery(output: Output): Array<[string, string]> {
  return typeof output === 'string' ? [] : [['callback', output.callback]];
}

/** Parse an output format; matching is case-sensitive (`JSON`, not `json`). */
export function parseOutputFormat(input: string): SafeWrap<ParseEnumError, OutputFormat> {
  return parseLiteral(OUTPUT_FORMATS, input, 'OutputFormat');
}
