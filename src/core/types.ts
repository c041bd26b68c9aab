import type { ErrorStrategy } from '../error/errorStrategy.js';
import type { Logger } from '../logger/logger.js';
import type { RequestMethod } from '../request/urlBuilder.js';
import type { FetchClientProvider, HeaderOptions } from '../types/request.js';

/** Statuses that mean "try again later"; every other status is final. */
export const RETRY_STATUSES: readonly number[] = [429, 503, 504];

/** Per-call overrides of the client configuration. */
export interface RequestOptions {
  /** Per-attempt timeout in milliseconds, `0` disables it */
  timeout?: number;
  maxRetries?: number;
  retryDelay?: number;
  /** Merged over the configured headers */
  headers?: HeaderOptions;
  /** Cancels the request, including a pending retry wait */
  signal?: AbortSignal;
}

/** A response that was neither a fault nor a failed status. */
export interface RawResponse {
  status: number;
  body: string;
  contentType: string | null;
  /** Absolute URL, query included */
  url: string;
  method: RequestMethod;
}

/** Collaborators of a {@link PubChemClient}; all optional. */
export interface PubChemClientProps {
  /** HTTP client implementation. Defaults to {@link FetchClient}. */
  fetchProvider?: FetchClientProvider;
  /** Defaults to the process-wide console logger */
  logger?: Logger;
  /** Defaults to the strategy read from the environment */
  errorStrategy?: ErrorStrategy;
}
