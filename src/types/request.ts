import type { SafeWrapAsync } from '../utils/wrap.js';

/** Header containers accepted wherever headers are merged. `null` removes a header. */
export type HeaderOptions = NonNullable<RequestInit['headers']> | Record<string, string | null | undefined>;

/** Options for a single call on a {@link FetchClientProviderDefinition}. */
export interface FetchOptions {
  /** Merged over the provider defaults */
  headers?: HeaderOptions;
  /** Cancels the call */
  signal?: AbortSignal;
}

/** Options for a POST call; the body is already encoded. */
export interface FetchPostOptions extends FetchOptions {
  body: string;
}

/** Defaults applied by a provider to every call. */
export interface FetchClientOptions {
  headers?: HeaderOptions;
}

/** A fully read response. Any status is a response; only transport failures are errors. */
export interface FetchResponse {
  status: number;
  body: string;
  /** `Content-Type` header, `null` when absent */
  contentType: string | null;
}

/** Contract for HTTP client implementations used by {@link PubChemClient}. */
export interface FetchClientProviderDefinition {
  /** Executes a GET request. */
  get: (endpoint: string, options: FetchOptions) => SafeWrapAsync<Error, FetchResponse>;
  /** Executes a POST request. */
  post: (endpoint: string, options: FetchPostOptions) => SafeWrapAsync<Error, FetchResponse>;
  /** Updates default options for the provider. */
  config: (opts: FetchClientOptions) => void;
  /** Optional lifecycle hook to dispose resources (e.g., keep-alive agents). */
  dispose?: () => void;
}

/** Factory signature for constructing HTTP providers. */
export interface FetchClientProvider {
  /** Creates a provider that resolves endpoints against `baseUrl` */
  new (baseUrl: string, opts: FetchClientOptions): FetchClientProviderDefinition;
}
