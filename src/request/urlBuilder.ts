import { ConstructURLError } from '../error/constructUrlError.js';
import type { ErrorStrategy } from '../error/errorStrategy.js';
import type { SafeWrap } from '../utils/wrap.js';
import { domainSegments } from './domain.js';
import { identifierPieces } from './identifiers.js';
import { formatNamespace, namespaceSegments, parseNamespace, postField } from './namespace.js';
import { defaultOperation, formatOperation, operationSegments, parseOperation, type RawSegment } from './operation.js';
import { DEFAULT_OUTPUT, outputFormat, outputQuery, parseOutputFormat } from './output.js';
import { queryEntries, type RequestSpecification, usePost, validateSpecification } from './specification.js';

/** HTTP method of a resolved request. */
export type RequestMethod = 'GET' | 'POST';

/** A specification rendered into what goes on the wire. */
export interface ResolvedRequest {
  method: RequestMethod;
  /** Percent-encoded path segments, in order */
  segments: readonly string[];
  /** `application/x-www-form-urlencoded` body for POST, `null` for GET */
  body: string | null;
  /** Encoded query string without the leading `?`, `null` when there is none */
  query: string | null;
  /** `segments` joined by `/`, followed by `?query` when there is one */
  path: string;
}

function encodeSegment(segment: RawSegment): string {
  if (typeof segment === 'string') {
    return encodeURIComponent(segment);
  }
  return segment.map((piece) => encodeURIComponent(piece)).join(',');
}

function encodePairs(pairs: ReadonlyArray<[string, string]>): string | null {
  if (pairs.length === 0) {
    return null;
  }
  return pairs.map(([key, value]) => `${encodeURIComponent(key)}=${encodeURIComponent(value)}`).join('&');
}

/**
 * Render a specification into method, path segments, body and query. Pure and
 * deterministic: equal specifications give equal results.
 *
 * Segment order is domain, namespace, identifier (GET only), operation, output.
 * Under POST the identifier moves into the body as `<field>=<value>`. Every
 * segment, body value and query key/value is percent-encoded on its own, so the
 * `/`, `,`, `=` and `&` separators stay literal.
 *
 * Invalid specifications fail with the {@link InvalidInputError} from
 * {@link validateSpecification}. A value that passes validation but has no URL
 * mapping fails with a {@link ConstructURLError} wrapping the {@link ParseEnumError}.
 */
export function buildUrlParts(spec: RequestSpecification, strategy?: ErrorStrategy): SafeWrap<Error, ResolvedRequest> {
  const [errValid] = validateSpecification(spec, strategy);
  if (errValid) {
    return [errValid, null];
  }

  const raw: RawSegment[] = [];
  const fail = (what: string, cause: Error): SafeWrap<Error, ResolvedRequest> => [
    new ConstructURLError(`error rendering ${what}`, raw.map(encodeSegment), { cause }),
    null,
  ];

  const [errDomain, domain] = domainSegments(spec.domain);
  if (errDomain) {
    return fail('domain', errDomain);
  }
  raw.push(...domain);

  const post = usePost(spec);
  if (spec.namespace) {
    const [errNamespace] = parseNamespace(spec.namespace.domain, formatNamespace(spec.namespace));
    if (errNamespace) {
      return fail('namespace', errNamespace);
    }
    raw.push(...namespaceSegments(spec.namespace));
  }

  if (spec.identifiers && !post) {
    raw.push(identifierPieces(spec.identifiers));
  }

  const operation = spec.operation ?? defaultOperation(spec.domain);
  if (operation) {
    const [errOperation] = parseOperation(spec.domain, formatOperation(operation));
    if (errOperation) {
      return fail('operation', errOperation);
    }
    raw.push(...operationSegments(operation));
  }

  const output = spec.output ?? DEFAULT_OUTPUT;
  const [errOutput, format] = parseOutputFormat(outputFormat(output));
  if (errOutput) {
    return fail('output', errOutput);
  }
  raw.push(format);

  const segments = raw.map(encodeSegment);
  const body =
    post && spec.namespace && spec.identifiers
      ? `${encodeURIComponent(postField(spec.namespace))}=${encodeSegment(identifierPieces(spec.identifiers))}`
      : null;
  const query = encodePairs([...queryEntries(spec.query), ...outputQuery(output)]);

  return [
    null,
    {
      method: post ? 'POST' : 'GET',
      segments,
      body,
      query,
      path: query ? `${segments.join('/')}?${query}` : segments.join('/'),
    },
  ];
}

/** Full URL of a resolved request under `baseUrl`. */
export function resolveUrl(baseUrl: string, resolved: ResolvedRequest): string {
  return `${baseUrl.replace(/\/+$/, '')}/${resolved.path}`;
}
