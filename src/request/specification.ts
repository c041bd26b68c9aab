import { type ErrorStrategy, errorStrategy, invalidInput } from '../error/errorStrategy.js';
import type { InvalidInputError } from '../error/invalidInputError.js';
import type { SafeWrap } from '../utils/wrap.js';
import { type Domain, isAuxiliaryDomain } from './domain.js';
import { type Identifiers, toIdentifiers } from './identifiers.js';
import { formatNamespace, identifierShape, type Namespace, namespaceRequiresPost } from './namespace.js';
import { type Operation, operationList } from './operation.js';
import type { Output } from './output.js';

/**
 * Extra query parameters. A `Map` is serialized in insertion order. A plain object
 * follows property order, which puts integer-like keys first, so use a `Map` when
 * the order of such keys matters.
 */
export type QueryParams = Readonly<Record<string, string>> | ReadonlyMap<string, string>;

/** Everything needed to address one PUG REST request. */
export interface RequestSpecification {
  domain: Domain;
  /** Required for every domain except the auxiliary ones, which take none. */
  namespace?: Namespace;
  /** Required for every domain except the auxiliary ones, where it is an optional trailing segment. */
  identifiers?: Identifiers;
  /** Defaults to `record` or `summary` depending on the domain. */
  operation?: Operation;
  /** Defaults to `JSON`. */
  output?: Output;
  query?: QueryParams;
}

function shapeError(spec: RequestSpecification, ns: Namespace, ids: Identifiers): string | null {
  const label = `namespace ${spec.domain}/${formatNamespace(ns)}`;
  switch (identifierShape(ns)) {
    case 'numeric':
      return ids.kind === 'text' ? `${label} takes numeric identifiers, got text` : null;
    case 'single-numeric':
      return ids.kind === 'id' ? null : `${label} takes exactly one numeric identifier`;
    case 'text':
      return ids.kind === 'text' ? null : `${label} takes a text identifier, got numbers`;
    case 'any':
      return null;
  }
}

/** Name of the namespace's free-text argument when it is blank. */
function blankNamespaceArgument(ns: Namespace): string | null {
  switch (ns.kind) {
    case 'sourceid':
    case 'sourceall':
      return ns.source.trim() === '' ? 'source' : null;
    case 'activity':
      return ns.column.trim() === '' ? 'column' : null;
    default:
      return null;
  }
}

/**
 * Check a specification before anything is built or sent. Checks run in order and
 * the first failure is returned:
 *
 * 1. a namespace is given exactly when the domain is not auxiliary
 * 2. the namespace belongs to the domain, and its source or column is not blank
 * 3. identifiers are given for non-auxiliary domains, and are well formed
 * 4. the identifier variant fits the namespace
 * 5. the operation belongs to the domain; auxiliary domains take none
 * 6. property and xref lists are non-empty, without blank entries
 */
export function validateSpecification(
  spec: RequestSpecification,
  strategy: ErrorStrategy = errorStrategy(),
): SafeWrap<InvalidInputError, RequestSpecification> {
  const auxiliary = isAuxiliaryDomain(spec.domain);

  if (auxiliary && spec.namespace) {
    return [invalidInput(`domain ${spec.domain} takes no namespace`, strategy), null];
  }
  if (!auxiliary && !spec.namespace) {
    return [invalidInput(`domain ${spec.domain} requires a namespace`, strategy), null];
  }
  if (spec.namespace && spec.namespace.domain !== spec.domain) {
    return [
      invalidInput(`namespace ${formatNamespace(spec.namespace)} belongs to ${spec.namespace.domain}, not ${spec.domain}`, strategy),
      null,
    ];
  }
  if (spec.namespace) {
    const blank = blankNamespaceArgument(spec.namespace);
    if (blank) {
      return [invalidInput(`namespace ${spec.namespace.kind} has a blank ${blank}`, strategy), null];
    }
  }

  if (spec.identifiers) {
    const [err] = toIdentifiers(spec.identifiers, strategy);
    if (err) {
      return [err, null];
    }
  } else if (!auxiliary) {
    return [invalidInput(`domain ${spec.domain} requires identifiers`, strategy), null];
  }

  if (spec.namespace && spec.identifiers) {
    const mismatch = shapeError(spec, spec.namespace, spec.identifiers);
    if (mismatch) {
      return [invalidInput(mismatch, strategy), null];
    }
  }

  if (spec.operation) {
    if (auxiliary) {
      return [invalidInput(`domain ${spec.domain} takes no operation`, strategy), null];
    }
    if (spec.operation.domain !== spec.domain) {
      return [
        invalidInput(`operation ${spec.operation.kind} belongs to ${spec.operation.domain}, not ${spec.domain}`, strategy),
        null,
      ];
    }
    const list = operationList(spec.operation);
    if (list !== null && list.length === 0) {
      return [invalidInput(`operation ${spec.operation.kind} needs at least one entry`, strategy), null];
    }
    if (list?.some((entry) => entry.trim() === '')) {
      return [invalidInput(`operation ${spec.operation.kind} has a blank entry`, strategy), null];
    }
  }

  return [null, spec];
}

/** Whether the request goes out as POST. Always false without a namespace. */
export function usePost(spec: RequestSpecification): boolean {
  return spec.namespace ? namespaceRequiresPost(spec.namespace) : false;
}

function isQueryMap(query: QueryParams): query is ReadonlyMap<string, string> {
  return query instanceof Map;
}

/** Query parameters as ordered pairs. */
export function queryEntries(query: QueryParams | undefined): Array<[string, string]> {
  if (!query) {
    return [];
  }
  if (isQueryMap(query)) {
    return [...query.entries()];
  }
  return Object.entries(query);
}
