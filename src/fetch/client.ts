import type {
  FetchClientOptions,
  FetchClientProviderDefinition,
  FetchOptions,
  FetchPostOptions,
  FetchResponse,
} from '../types/request.js';
import { type SafeWrapAsync, safeWrapAsync } from '../utils/wrap.js';
import { mergeHeaderOptions } from './utils.js';

type Method = 'GET' | 'POST';

/**
 * Thin wrapper around the native `fetch` API that:
 * - prefixes all requests with a configured base URL,
 * - merges default and per-request headers,
 * - reads the body as text and returns error-first tuples via {@link SafeWrapAsync}.
 *
 * Every status is returned as a response. Deciding what a status means is left to
 * the caller.
 */
export class FetchClient implements FetchClientProviderDefinition {
  /** Base URL prepended to all request paths, with a trailing slash. */
  #baseUrl: string;
  /** Default fetch options. */
  #opts: FetchClientOptions;

  /** Creates a new instance of the fetch-client, with a base-url + options */
  constructor(baseUrl: string, opts?: FetchClientOptions) {
    this.#baseUrl = baseUrl.endsWith('/') ? baseUrl : `${baseUrl}/`;
    this.#opts = opts ?? {};
  }

  /**
   * Updates default options (merged with existing headers).
   */
  public config(opts: FetchClientOptions) {
    this.#opts = {
      ...this.#opts,
      ...opts,
      headers: mergeHeaderOptions(this.#opts.headers, opts.headers),
    };
  }

  /**
   * Executes a GET request against the given endpoint.
   *
   * @param endpoint - Relative endpoint path (e.g. `compound/cid/2244/JSON`).
   */
  public get(endpoint: string, opts: FetchOptions): SafeWrapAsync<Error, FetchResponse> {
    return this.#request('GET', endpoint, opts);
  }

  /**
   * Executes a POST request against the given endpoint with an encoded body.
   */
  public post(endpoint: string, opts: FetchPostOptions): SafeWrapAsync<Error, FetchResponse> {
    return this.#request('POST', endpoint, opts, opts.body);
  }

  /**
   * Errors:
   * - Network / fetch errors (including aborts) are wrapped in `Error`, with the
   *   original as `cause`.
   * - A body that cannot be read is wrapped the same way.
   */
  async #request(method: Method, endpoint: string, opts: FetchOptions, body?: string): SafeWrapAsync<Error, FetchResponse> {
    const headers = mergeHeaderOptions(this.#opts.headers, opts.headers);

    const [err, res] = await safeWrapAsync(() =>
      fetch(this.constructPath(endpoint), {
        method,
        body,
        headers,
        ...(opts.signal && { signal: opts.signal }),
      }),
    );
    if (err) {
      return [new Error(`error wrapping ${method} request in fetchClient`, { cause: err }), null];
    }

    const [errBody, text] = await safeWrapAsync(() => res.text());
    if (errBody) {
      return [new Error(`error reading ${method} response body in fetchClient`, { cause: errBody }), null];
    }

    return [null, { status: res.status, body: text, contentType: res.headers.get('content-type') }];
  }

  /**
   * Joins the base URL and endpoint, stripping a leading slash from the endpoint
   * to avoid `//` in the URL.
   */
  private constructPath(endpoint: string): string {
    return `${this.#baseUrl}${endpoint.replace(/^\//, '')}`;
  }
}
