import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { createLogger } from 'winston';
import type { ClientConfigInput } from '../config/config.js';
import { AbortError, isAbortError } from '../error/abortError.js';
import { ApiFaultError } from '../error/apiFaultError.js';
import { errorKind } from '../error/errorKind.js';
import { getHttpError, HTTPError } from '../error/httpError.js';
import { InvalidInputError } from '../error/invalidInputError.js';
import { isParseResponseError } from '../error/parseResponseError.js';
import { RetryExhaustedError } from '../error/retryExhaustedError.js';
import { RetrySuppressedError } from '../error/retrySuppressedError.js';
import { isTimeoutError } from '../error/timeoutError.js';
import { getValidationError, ValidationError } from '../error/validationError.js';
import type { RequestSpecification } from '../request/specification.js';
import type {
  FetchClientOptions,
  FetchClientProviderDefinition,
  FetchOptions,
  FetchResponse,
} from '../types/request.js';
import type { SafeWrap } from '../utils/wrap.js';
import { PubChemClient } from './client.js';

const get = vi.fn<FetchClientProviderDefinition['get']>();
const post = vi.fn<FetchClientProviderDefinition['post']>();
const dispose = vi.fn<() => void>();
const constructed: Array<{ baseUrl: string; opts: FetchClientOptions }> = [];

class MockFetchClient implements FetchClientProviderDefinition {
  get = get;
  post = post;
  config = vi.fn<FetchClientProviderDefinition['config']>();
  dispose = dispose;

  constructor(baseUrl: string, opts: FetchClientOptions) {
    constructed.push({ baseUrl, opts });
  }
}

const logger = createLogger({ silent: true });

const BASE = 'https://pubchem.ncbi.nlm.nih.gov/rest/pug';

const aspirin: RequestSpecification = {
  domain: 'compound',
  namespace: { domain: 'compound', kind: 'cid' },
  identifiers: { kind: 'id', id: 2244 },
};

const respond = (status: number, body: string, contentType: string | null = 'application/json') =>
  Promise.resolve<SafeWrap<Error, FetchResponse>>([null, { status, body, contentType }]);

/** Resolves with a wrapped abort reason once the call's signal aborts, like FetchClient does. */
const pendingUntilAbort = (_endpoint: string, options: FetchOptions) =>
  new Promise<SafeWrap<Error, FetchResponse>>((resolve) => {
    options.signal?.addEventListener('abort', () => {
      resolve([new Error('error wrapping GET request in fetchClient', { cause: options.signal?.reason }), null]);
    });
  });

function createClient(config: ClientConfigInput = {}): PubChemClient {
  const [err, client] = PubChemClient.create(
    { retryDelay: 100, ...config },
    { fetchProvider: MockFetchClient, logger, errorStrategy: 'normal' },
  );
  if (err) {
    throw err;
  }
  return client;
}

describe('PubChemClient', () => {
  beforeEach(() => {
    get.mockReset();
    post.mockReset();
    dispose.mockReset();
    constructed.length = 0;
  });

  afterEach(() => {
    vi.restoreAllMocks();
    vi.useRealTimers();
  });

  describe('create', () => {
    it('constructs the provider with base URL and headers', () => {
      const [err, client] = PubChemClient.create(
        { headers: { 'X-Tool': 'test' } },
        { fetchProvider: MockFetchClient, logger },
      );

      expect(err).toBeNull();
      expect(constructed).toEqual([{ baseUrl: BASE, opts: { headers: { 'X-Tool': 'test' } } }]);
      expect(client?.config).toEqual({
        baseUrl: BASE,
        timeout: 30_000,
        maxRetries: 3,
        retryDelay: 500,
        headers: { 'X-Tool': 'test' },
      });
    });

    it('rejects an invalid config without constructing a provider', () => {
      const [err, client] = PubChemClient.create({ timeout: -5 }, { fetchProvider: MockFetchClient, logger });

      expect(client).toBeNull();
      expect(err).toBeInstanceOf(ValidationError);
      expect(constructed).toHaveLength(0);
    });
  });

  describe('url', () => {
    it('resolves a specification against the base URL', () => {
      expect(createClient().url(aspirin)).toEqual([null, `${BASE}/compound/cid/2244/record/JSON`]);
    });
  });

  describe('request', () => {
    it('sends a GET and returns the raw response', async () => {
      get.mockReturnValueOnce(respond(200, '{"ok":true}'));
      const debug = vi.spyOn(logger, 'debug');

      const [err, response] = await createClient().request(aspirin);

      expect(err).toBeNull();
      expect(response).toEqual({
        status: 200,
        body: '{"ok":true}',
        contentType: 'application/json',
        url: `${BASE}/compound/cid/2244/record/JSON`,
        method: 'GET',
      });
      expect(get).toHaveBeenCalledTimes(1);
      expect(get).toHaveBeenCalledWith('compound/cid/2244/record/JSON', {
        headers: expect.any(Headers),
        signal: expect.any(AbortSignal),
      });
      expect(post).not.toHaveBeenCalled();
      expect(debug).toHaveBeenCalledWith('GET compound/cid/2244/record/JSON');
    });

    it('sends structure namespaces as a form POST', async () => {
      post.mockReturnValueOnce(respond(200, '{"IdentifierList":{"CID":[702]}}'));
      const debug = vi.spyOn(logger, 'debug');

      const [err, response] = await createClient().request({
        domain: 'compound',
        namespace: { domain: 'compound', kind: 'smiles' },
        identifiers: { kind: 'text', text: 'CCO' },
        operation: { domain: 'compound', kind: 'cids' },
      });

      expect(err).toBeNull();
      expect(response?.method).toBe('POST');
      expect(get).not.toHaveBeenCalled();

      const [endpoint, options] = post.mock.calls[0] ?? [];
      expect(endpoint).toBe('compound/smiles/cids/JSON');
      expect(options?.body).toBe('smiles=CCO');
      const headers = options?.headers;
      expect(headers instanceof Headers ? headers.get('content-type') : null).toBe(
        'application/x-www-form-urlencoded',
      );
      expect(debug).toHaveBeenCalledWith('POST compound/smiles/cids/JSON body_len=10');
    });

    it('keeps the query string out of the log', async () => {
      get.mockReturnValueOnce(respond(200, '{}'));
      const debug = vi.spyOn(logger, 'debug');

      await createClient().request({ ...aspirin, query: { record_type: '3d' } });

      expect(get.mock.calls[0]?.[0]).toBe('compound/cid/2244/record/JSON?record_type=3d');
      expect(debug).toHaveBeenCalledWith('GET compound/cid/2244/record/JSON');
    });

    it('merges per-call headers', async () => {
      get.mockReturnValueOnce(respond(200, '{}'));

      await createClient().request(aspirin, { headers: { 'X-Call': '1' } });

      const headers = get.mock.calls[0]?.[1].headers;
      expect(headers instanceof Headers ? headers.get('x-call') : null).toBe('1');
    });

    it('validates before calling the transport', async () => {
      const [err] = await createClient().request({ ...aspirin, identifiers: { kind: 'ids', ids: [] } });

      expect(err).toBeInstanceOf(InvalidInputError);
      expect(err?.message).toBe('identifier list must not be empty');
      expect(get).not.toHaveBeenCalled();
    });

    it('rejects invalid per-call overrides', async () => {
      const [err] = await createClient().request(aspirin, { retryDelay: -1 });

      expect(err).toBeInstanceOf(InvalidInputError);
      expect(err?.message).toBe('retryDelay must be a non-negative integer, got -1');
      expect(get).not.toHaveBeenCalled();
    });
  });

  describe('retries', () => {
    beforeEach(() => {
      vi.useFakeTimers();
    });

    it('retries 503 twice, waiting the delay and then twice the delay', async () => {
      get
        .mockReturnValueOnce(respond(503, ''))
        .mockReturnValueOnce(respond(503, ''))
        .mockReturnValueOnce(respond(200, '{"ok":true}'));
      const warn = vi.spyOn(logger, 'warn');

      const promise = createClient({ maxRetries: 3, retryDelay: 100 }).request(aspirin);
      expect(get).toHaveBeenCalledTimes(1);

      await vi.advanceTimersByTimeAsync(99);
      expect(get).toHaveBeenCalledTimes(1);
      await vi.advanceTimersByTimeAsync(1);
      expect(get).toHaveBeenCalledTimes(2);

      await vi.advanceTimersByTimeAsync(199);
      expect(get).toHaveBeenCalledTimes(2);
      await vi.advanceTimersByTimeAsync(1);
      expect(get).toHaveBeenCalledTimes(3);

      const [err, response] = await promise;
      expect(err).toBeNull();
      expect(response?.body).toBe('{"ok":true}');
      expect(warn.mock.calls).toEqual([
        ['retrying attempt 2/4 after 100ms'],
        ['retrying attempt 3/4 after 200ms'],
      ]);
    });

    it('retries 429 and 504 as well', async () => {
      get
        .mockReturnValueOnce(respond(429, ''))
        .mockReturnValueOnce(respond(504, ''))
        .mockReturnValueOnce(respond(200, '{}'));

      const promise = createClient({ retryDelay: 10 }).request(aspirin);
      await vi.advanceTimersByTimeAsync(30);
      const [err] = await promise;

      expect(err).toBeNull();
      expect(get).toHaveBeenCalledTimes(3);
    });

    it('gives up after maxRetries with the last status as cause', async () => {
      get.mockImplementation(() => respond(503, 'busy'));

      const promise = createClient({ maxRetries: 2, retryDelay: 100 }).request(aspirin);
      await vi.advanceTimersByTimeAsync(300);
      const [err, response] = await promise;

      expect(response).toBeNull();
      expect(get).toHaveBeenCalledTimes(3);
      expect(err).toBeInstanceOf(RetryExhaustedError);
      expect(err instanceof RetryExhaustedError ? err.attempts : null).toBe(3);
      expect(getHttpError(err)?.status).toBe(503);
      expect(getHttpError(err)?.body).toBe('busy');
      expect(errorKind(err)).toBe('http-status');
    });

    it('takes maxRetries per call', async () => {
      get.mockImplementation(() => respond(503, ''));

      const [err] = await createClient({ maxRetries: 3 }).request(aspirin, { maxRetries: 0 });

      expect(get).toHaveBeenCalledTimes(1);
      expect(err instanceof RetryExhaustedError ? err.attempts : null).toBe(1);
    });

    it('stops waiting when the caller aborts', async () => {
      get.mockImplementation(() => respond(503, ''));
      const controller = new AbortController();
      const reason = new AbortError('stop');

      const promise = createClient({ retryDelay: 1000 }).request(aspirin, { signal: controller.signal });
      await vi.advanceTimersByTimeAsync(10);
      controller.abort(reason);
      const [err] = await promise;

      expect(get).toHaveBeenCalledTimes(1);
      expect(err).toBeInstanceOf(RetrySuppressedError);
      expect(err?.message).toBe('error retry aborted');
      expect(err?.cause).toBe(reason);
    });

    it('times out a hanging attempt without retrying it', async () => {
      get.mockImplementationOnce(pendingUntilAbort);

      const promise = createClient({ timeout: 1000 }).request(aspirin);
      await vi.advanceTimersByTimeAsync(1000);
      const [err] = await promise;

      expect(get).toHaveBeenCalledTimes(1);
      expect(err).toBeInstanceOf(RetrySuppressedError);
      expect(isTimeoutError(err)).toBe(true);
      expect(errorKind(err)).toBe('transport');
    });
  });

  describe('final responses', () => {
    it('returns a single 404 as HTTPError', async () => {
      get.mockReturnValueOnce(respond(404, 'missing', 'text/plain'));

      const [err] = await createClient().request(aspirin);

      expect(get).toHaveBeenCalledTimes(1);
      expect(err).toBeInstanceOf(HTTPError);
      expect(err instanceof HTTPError ? [err.status, err.body] : null).toEqual([404, 'missing']);
    });

    it('returns a fault document as ApiFaultError', async () => {
      get.mockReturnValueOnce(
        respond(404, '{"Fault":{"Code":"PUGREST.NotFound","Message":"No CID found","Details":["No CID found that matches the given name"]}}'),
      );

      const [err] = await createClient().request(aspirin);

      expect(err).toBeInstanceOf(ApiFaultError);
      if (!(err instanceof ApiFaultError)) {
        return;
      }
      expect(err.code).toBe('PUGREST.NotFound');
      expect(err.faultMessage).toBe('No CID found');
      expect(err.details).toEqual(['No CID found that matches the given name']);
      expect(err.status).toBe(404);
    });

    it('treats a fault in a 200 response as a fault', async () => {
      get.mockReturnValueOnce(respond(200, '{"Fault":{"Code":"PUGREST.NotFound","Message":"no compound"}}'));

      const [err, response] = await createClient().request(aspirin);

      expect(response).toBeNull();
      expect(err).toBeInstanceOf(ApiFaultError);
      expect(err instanceof ApiFaultError ? [err.code, err.faultMessage, err.status] : null).toEqual([
        'PUGREST.NotFound',
        'no compound',
        200,
      ]);
      expect(errorKind(err)).toBe('api-fault');
    });

    it('does not retry network failures', async () => {
      const failure = new TypeError('fetch failed');
      get.mockResolvedValueOnce([new Error('error wrapping GET request in fetchClient', { cause: failure }), null]);

      const [err] = await createClient().request(aspirin);

      expect(get).toHaveBeenCalledTimes(1);
      expect(err).toBeInstanceOf(RetrySuppressedError);
      expect(err instanceof RetrySuppressedError ? err.attempts : null).toBe(1);
      expect(errorKind(err)).toBe('transport');
    });

    it('wraps a provider that throws', async () => {
      get.mockImplementationOnce(() => {
        throw new TypeError('boom');
      });

      const [err] = await createClient().request(aspirin);

      expect(err).toBeInstanceOf(RetrySuppressedError);
      expect(err?.cause instanceof Error ? err.cause.message : null).toBe('error calling request GET in request');
    });
  });

  describe('dispose', () => {
    it('aborts in-flight attempts and disposes the provider', async () => {
      get.mockImplementationOnce(pendingUntilAbort);
      const client = createClient();

      const promise = client.request(aspirin);
      client.dispose();
      const [err] = await promise;

      expect(dispose).toHaveBeenCalledTimes(1);
      expect(err).toBeInstanceOf(RetrySuppressedError);
      expect(isAbortError(err)).toBe(true);
    });
  });

  describe('typed helpers', () => {
    it('properties resolves aliases and coerces masses', async () => {
      get.mockReturnValueOnce(
        respond(200, '{"PropertyTable":{"Properties":[{"CID":2244,"MolecularWeight":"180.16","XLogP":1.2}]}}'),
      );

      const [err, rows] = await createClient().properties(2244, ['molecular_weight', 'XLogP']);

      expect(err).toBeNull();
      expect(get.mock.calls[0]?.[0]).toBe('compound/cid/2244/property/MolecularWeight,XLogP/JSON');
      expect(rows).toEqual([{ CID: 2244, MolecularWeight: 180.16, XLogP: 1.2 }]);
    });

    it('compounds keeps the records as delivered', async () => {
      get.mockReturnValueOnce(respond(200, '{"PC_Compounds":[{"id":{"id":{"cid":2244}},"atoms":{"aid":[1,2]}}]}'));

      const [, records] = await createClient().compounds([2244]);

      expect(get.mock.calls[0]?.[0]).toBe('compound/cid/2244/record/JSON');
      expect(records).toEqual([{ id: { id: { cid: 2244 } }, atoms: { aid: [1, 2] } }]);
    });

    it('cids looks up by name and normalizes a single CID', async () => {
      get.mockReturnValueOnce(respond(200, '{"IdentifierList":{"CID":2244}}'));

      const [err, cids] = await createClient().cids('aspirin');

      expect(err).toBeNull();
      expect(get.mock.calls[0]?.[0]).toBe('compound/name/aspirin/cids/JSON');
      expect(cids).toEqual([2244]);
    });

    it('cids keeps lists in order', async () => {
      get.mockReturnValueOnce(respond(200, '{"IdentifierList":{"CID":[5793,962]}}'));

      const [, cids] = await createClient().cids(12345, { domain: 'substance', kind: 'sid' });

      expect(get.mock.calls[0]?.[0]).toBe('substance/sid/12345/cids/JSON');
      expect(cids).toEqual([5793, 962]);
    });

    it('synonyms follows the namespace domain', async () => {
      get.mockReturnValueOnce(respond(200, '{"InformationList":{"Information":[{"SID":12345,"Synonym":["a","b"]}]}}'));

      const [, entries] = await createClient().synonyms(12345, { domain: 'substance', kind: 'sid' });

      expect(get.mock.calls[0]?.[0]).toBe('substance/sid/12345/synonyms/JSON');
      expect(entries).toEqual([{ SID: 12345, Synonym: ['a', 'b'] }]);
    });

    it('sources lists substance or assay depositors', async () => {
      get
        .mockReturnValueOnce(respond(200, '{"InformationList":{"SourceName":["DTP/NCI","ChEMBL"]}}'))
        .mockReturnValueOnce(respond(200, '{"InformationList":{"SourceName":["ChEMBL"]}}'));
      const client = createClient();

      const [, substance] = await client.sources();
      const [, assay] = await client.sources('assay');

      expect(get.mock.calls.map(([endpoint]) => endpoint)).toEqual(['sources/substance/JSON', 'sources/assay/JSON']);
      expect(substance).toEqual(['DTP/NCI', 'ChEMBL']);
      expect(assay).toEqual(['ChEMBL']);
    });

    it('text returns non-JSON bodies as they are', async () => {
      get.mockReturnValueOnce(respond(200, '2244\n  -OEChem-\n', 'chemical/x-mdl-sdfile'));

      const [err, sdf] = await createClient().text({ ...aspirin, output: 'SDF' });

      expect(err).toBeNull();
      expect(get.mock.calls[0]?.[0]).toBe('compound/cid/2244/record/SDF');
      expect(sdf).toBe('2244\n  -OEChem-\n');
    });

    it('reports a body that is not JSON', async () => {
      get.mockReturnValueOnce(respond(200, 'not json', 'text/plain'));

      const [err] = await createClient().properties(2244, ['XLogP']);

      expect(isParseResponseError(err)).toBe(true);
      expect(err?.message).toBe('error decoding response JSON');
      expect(errorKind(err)).toBe('parse-response');
    });

    it('reports JSON of the wrong shape', async () => {
      get.mockReturnValueOnce(respond(200, '{"PropertyTable":{}}'));

      const [err] = await createClient().properties(2244, ['XLogP']);

      expect(isParseResponseError(err)).toBe(true);
      expect(err?.message).toBe('error validating response');
      expect(getValidationError(err)?.issues[0]?.path).toEqual(['PropertyTable', 'Properties']);
    });

    it('rejects bad identifiers before sending', async () => {
      const [err] = await createClient().cids('  ');

      expect(err).toBeInstanceOf(InvalidInputError);
      expect(get).not.toHaveBeenCalled();
    });
  });
});
