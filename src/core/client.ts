import type { StandardSchemaV1 } from '@standard-schema/spec';
import { type ClientConfig, type ClientConfigInput, DEFAULT_CLIENT_CONFIG, parseClientConfig } from '../config/config.js';
import { AbortError } from '../error/abortError.js';
import { type ErrorStrategy, errorStrategy, invalidInput, parseResponse } from '../error/errorStrategy.js';
import { HTTPError } from '../error/httpError.js';
import { unwrapErrorType } from '../error/unwrapErrorType.js';
import type { ValidationError } from '../error/validationError.js';
import { FetchClient } from '../fetch/client.js';
import { formHeaders, mergeHeaderOptions } from '../fetch/utils.js';
import { getDefaultLogger, type Logger } from '../logger/logger.js';
import { type IdentifierInput, type Identifiers, toIdentifiers } from '../request/identifiers.js';
import type { AssayNamespace, CompoundNamespace, SubstanceNamespace } from '../request/namespace.js';
import type { QueryParams, RequestSpecification } from '../request/specification.js';
import { buildUrlParts, type ResolvedRequest, resolveUrl } from '../request/urlBuilder.js';
import type { FetchClientProviderDefinition, FetchResponse, HeaderOptions } from '../types/request.js';
import { classifyResponse, outcomeToResult } from '../utils/classifyResponse.js';
import { retry } from '../utils/retry.js';
import { createTimeoutSignal, mergeSignals } from '../utils/signals.js';
import { tryParse } from '../utils/tryParse.js';
import { validator } from '../utils/validator.js';
import { type SafeWrap, type SafeWrapAsync, safeWrapAsync } from '../utils/wrap.js';
import {
  type CompoundRecord,
  compoundsResponseSchema,
  identifierListResponseSchema,
  type PropertyRow,
  propertiesResponseSchema,
  type SynonymEntry,
  sourcesResponseSchema,
  synonymsResponseSchema,
} from './schemas.js';
import { type PubChemClientProps, type RawResponse, RETRY_STATUSES, type RequestOptions } from './types.js';

const CID: CompoundNamespace = { domain: 'compound', kind: 'cid' };
const NAME: CompoundNamespace = { domain: 'compound', kind: 'name' };

function cidsSpec(
  namespace: CompoundNamespace | SubstanceNamespace | AssayNamespace,
  identifiers: Identifiers,
  query?: QueryParams,
): RequestSpecification {
  switch (namespace.domain) {
    case 'compound':
      return { domain: 'compound', namespace, identifiers, operation: { domain: 'compound', kind: 'cids' }, query };
    case 'substance':
      return { domain: 'substance', namespace, identifiers, operation: { domain: 'substance', kind: 'cids' }, query };
    case 'assay':
      return { domain: 'assay', namespace, identifiers, operation: { domain: 'assay', kind: 'cids' }, query };
  }
}

function isRetryable(err: Error): boolean {
  const httpError = unwrapErrorType(HTTPError, err);
  return httpError !== null && RETRY_STATUSES.includes(httpError.status);
}

/**
 * Client for the PubChem PUG REST service.
 *
 * - renders {@link RequestSpecification}s into GET or form-encoded POST requests,
 * - retries throttled and unavailable responses (429, 503, 504) with linear backoff,
 * - turns fault documents and failed statuses into typed errors,
 * - decodes the common JSON endpoints through zod schemas.
 *
 * Nothing here throws unless the panic error strategy is on; every method returns
 * an error-first tuple.
 */
export class PubChemClient {
  /** Underlying fetch-capable HTTP provider instance. */
  #fetchClient: FetchClientProviderDefinition;
  #config: ClientConfig;
  #logger: Logger;
  #strategy: ErrorStrategy;
  /** Aborted by {@link dispose}; every attempt and retry wait listens to it. */
  #abortController: AbortController;

  /** Creates a client from an already validated config. See {@link PubChemClient.create}. */
  constructor(config: ClientConfig = DEFAULT_CLIENT_CONFIG, props: PubChemClientProps = {}) {
    const { fetchProvider = FetchClient, logger = getDefaultLogger(), errorStrategy: strategy = errorStrategy() } = props;

    this.#config = config;
    this.#logger = logger;
    this.#strategy = strategy;
    this.#abortController = new AbortController();
    this.#fetchClient = new fetchProvider(config.baseUrl, { headers: config.headers });
  }

  /** Validates `config`, fills in defaults and creates a client. */
  static create(config: ClientConfigInput = {}, props: PubChemClientProps = {}): SafeWrap<ValidationError, PubChemClient> {
    const [err, parsed] = parseClientConfig(config);
    if (err) {
      return [err, null];
    }
    return [null, new PubChemClient(parsed, props)];
  }

  /** Effective configuration. */
  get config(): Readonly<ClientConfig> {
    return this.#config;
  }

  /**
   * Aborts in-flight attempts and pending retry waits, then releases the provider.
   * Requests made afterwards fail straight away.
   */
  dispose() {
    this.#abortController.abort(new AbortError('client was disposed'));
    this.#fetchClient.dispose?.();
  }

  /**
   * Absolute URL of a specification without performing a request. POST requests
   * carry their identifiers in the body, which this URL leaves out.
   */
  url(spec: RequestSpecification): SafeWrap<Error, string> {
    const [err, resolved] = buildUrlParts(spec, this.#strategy);
    if (err) {
      return [err, null];
    }
    return [null, resolveUrl(this.#config.baseUrl, resolved)];
  }

  /**
   * Performs one PUG REST request.
   *
   * The specification is validated and rendered before anything is sent. Attempts
   * run one after another; a 429, 503 or 504 is retried after `retryDelay * n`
   * milliseconds until `maxRetries` retries are spent, which yields a
   * {@link RetryExhaustedError} around the last {@link HTTPError}. A transport
   * failure (network error, timeout, abort) ends the loop with a
   * {@link RetrySuppressedError} around it. Any other response is final: a fault
   * document becomes an {@link ApiFaultError}, another non-2xx status an
   * {@link HTTPError}.
   */
  async request(spec: RequestSpecification, opts: RequestOptions = {}): SafeWrapAsync<Error, RawResponse> {
    const [errOpts] = this.#checkOptions(opts);
    if (errOpts) {
      return [errOpts, null];
    }

    const [errBuild, resolved] = buildUrlParts(spec, this.#strategy);
    if (errBuild) {
      return [errBuild, null];
    }

    const {
      timeout = this.#config.timeout,
      maxRetries = this.#config.maxRetries,
      retryDelay = this.#config.retryDelay,
    } = opts;
    const headers = resolved.method === 'POST' ? formHeaders(opts.headers) : mergeHeaderOptions(opts.headers);
    const waitSignal = mergeSignals([opts.signal, this.#abortController.signal]);

    const [err, response] = await retry<FetchResponse>({
      attempts: maxRetries,
      delay: retryDelay,
      signal: waitSignal?.signal,
      errFn: (e) => !isRetryable(e),
      onRetry: ({ attempt, maxAttempts, wait }) => {
        this.#logger.warn(`retrying attempt ${attempt + 1}/${maxAttempts} after ${wait}ms`);
      },
      fn: () => this.#attempt(resolved, headers, timeout, opts.signal),
    });
    waitSignal?.release();

    if (err) {
      return [err, null];
    }

    const [errOutcome, success] = outcomeToResult(classifyResponse(response.status, response.body));
    if (errOutcome) {
      return [errOutcome, null];
    }

    return [
      null,
      {
        status: success.status,
        body: success.body,
        contentType: response.contentType,
        url: resolveUrl(this.#config.baseUrl, resolved),
        method: resolved.method,
      },
    ];
  }

  /**
   * Full compound records.
   *
   * @example
   * const [err, records] = await client.compounds(2244);
   */
  compounds(
    identifiers: IdentifierInput,
    namespace: CompoundNamespace = CID,
    query?: QueryParams,
    opts?: RequestOptions,
  ): SafeWrapAsync<Error, CompoundRecord[]> {
    return this.#withIdentifiers(identifiers, async (ids) => {
      const [err, data] = await this.#json(
        { domain: 'compound', namespace, identifiers: ids, operation: { domain: 'compound', kind: 'record' }, query },
        compoundsResponseSchema,
        opts,
      );
      return err ? [err, null] : [null, data.PC_Compounds];
    });
  }

  /**
   * Property table rows. Tags take API names or snake_case aliases; masses are
   * returned as numbers.
   *
   * @example
   * const [err, rows] = await client.properties([2244, 962], ['MolecularWeight', 'xlogp']);
   */
  properties(
    identifiers: IdentifierInput,
    tags: readonly string[],
    namespace: CompoundNamespace = CID,
    query?: QueryParams,
    opts?: RequestOptions,
  ): SafeWrapAsync<Error, PropertyRow[]> {
    return this.#withIdentifiers(identifiers, async (ids) => {
      const [err, data] = await this.#json(
        {
          domain: 'compound',
          namespace,
          identifiers: ids,
          operation: { domain: 'compound', kind: 'property', tags },
          query,
        },
        propertiesResponseSchema,
        opts,
      );
      return err ? [err, null] : [null, data.PropertyTable.Properties];
    });
  }

  /** Synonyms of compounds or substances, depending on the namespace. */
  synonyms(
    identifiers: IdentifierInput,
    namespace: CompoundNamespace | SubstanceNamespace = CID,
    query?: QueryParams,
    opts?: RequestOptions,
  ): SafeWrapAsync<Error, SynonymEntry[]> {
    return this.#withIdentifiers(identifiers, async (ids) => {
      const spec: RequestSpecification =
        namespace.domain === 'compound'
          ? { domain: 'compound', namespace, identifiers: ids, operation: { domain: 'compound', kind: 'synonyms' }, query }
          : {
              domain: 'substance',
              namespace,
              identifiers: ids,
              operation: { domain: 'substance', kind: 'synonyms' },
              query,
            };
      const [err, data] = await this.#json(spec, synonymsResponseSchema, opts);
      return err ? [err, null] : [null, data.InformationList.Information];
    });
  }

  /**
   * CIDs matching the identifiers, by compound name unless another namespace is
   * given. A single CID is returned as a one-element list.
   */
  cids(
    identifiers: IdentifierInput,
    namespace: CompoundNamespace | SubstanceNamespace | AssayNamespace = NAME,
    query?: QueryParams,
    opts?: RequestOptions,
  ): SafeWrapAsync<Error, number[]> {
    return this.#withIdentifiers(identifiers, async (ids) => {
      const [err, data] = await this.#json(cidsSpec(namespace, ids, query), identifierListResponseSchema, opts);
      return err ? [err, null] : [null, data.IdentifierList.CID ?? []];
    });
  }

  /** Names of all depositors of substances (default) or assays. */
  async sources(domain: 'substance' | 'assay' = 'substance', opts?: RequestOptions): SafeWrapAsync<Error, string[]> {
    const [err, data] = await this.#json(
      { domain: domain === 'substance' ? 'sources/substance' : 'sources/assay' },
      sourcesResponseSchema,
      opts,
    );
    return err ? [err, null] : [null, data.InformationList.SourceName];
  }

  /** Body of a request as text, for outputs such as SDF, CSV or TXT. */
  async text(spec: RequestSpecification, opts?: RequestOptions): SafeWrapAsync<Error, string> {
    const [err, response] = await this.request(spec, opts);
    return err ? [err, null] : [null, response.body];
  }

  /** One attempt, bounded by the per-attempt timeout, the caller signal and dispose. */
  async #attempt(
    resolved: ResolvedRequest,
    headers: HeaderOptions,
    timeout: number,
    callerSignal?: AbortSignal,
  ): SafeWrapAsync<Error, FetchResponse> {
    const timeoutSignal = createTimeoutSignal(timeout);
    const signal = mergeSignals([callerSignal, timeoutSignal?.signal, this.#abortController.signal]);
    const route = resolved.segments.join('/');
    const options = { headers, ...(signal && { signal: signal.signal }) };

    try {
      const body = resolved.body ?? '';
      this.#logger.debug(resolved.method === 'POST' ? `POST ${route} body_len=${body.length}` : `GET ${route}`);
      const [errCall, wrapped] = await safeWrapAsync(() =>
        resolved.method === 'POST'
          ? this.#fetchClient.post(resolved.path, { ...options, body })
          : this.#fetchClient.get(resolved.path, options),
      );

      if (errCall) {
        return [new Error(`error calling request ${resolved.method} in request`, { cause: errCall }), null];
      }

      const [err, response] = wrapped;
      if (err) {
        return [new Error(`error request ${resolved.method} in request`, { cause: err }), null];
      }

      if (RETRY_STATUSES.includes(response.status)) {
        return [new HTTPError(response.status, response.body), null];
      }

      return [null, response];
    } finally {
      timeoutSignal?.release();
      signal?.release();
    }
  }

  /** Requests `spec` and decodes the body as JSON matching `schema`. */
  async #json<T extends StandardSchemaV1>(
    spec: RequestSpecification,
    schema: T,
    opts?: RequestOptions,
  ): SafeWrapAsync<Error, StandardSchemaV1.InferOutput<T>> {
    const [err, response] = await this.request(spec, opts);
    if (err) {
      return [err, null];
    }

    const [errJson, json] = tryParse(response.body);
    if (errJson) {
      return [parseResponse('error decoding response JSON', { cause: errJson }, this.#strategy), null];
    }

    const [errValidate, parsed] = await validator(json, schema, 'error validating response');
    if (errValidate) {
      return [parseResponse('error validating response', { cause: errValidate }, this.#strategy), null];
    }

    return [null, parsed];
  }

  async #withIdentifiers<T>(
    input: IdentifierInput,
    run: (ids: Identifiers) => SafeWrapAsync<Error, T>,
  ): SafeWrapAsync<Error, T> {
    const [err, ids] = toIdentifiers(input, this.#strategy);
    if (err) {
      return [err, null];
    }
    return run(ids);
  }

  #checkOptions(opts: RequestOptions): SafeWrap<Error, RequestOptions> {
    for (const key of ['timeout', 'maxRetries', 'retryDelay'] as const) {
      const value = opts[key];
      if (value !== undefined && (!Number.isSafeInteger(value) || value < 0)) {
        return [invalidInput(`${key} must be a non-negative integer, got ${value}`, this.#strategy), null];
      }
    }
    return [null, opts];
  }
}
