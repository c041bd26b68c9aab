/**
 * Root entrypoint for pugwire: re-exports the client, the request vocabulary and
 * the error utilities. Use this import if you want everything from a single
 * module surface.
 * @module
 */

/**
 * Client configuration, its defaults and the environment reader.
 */
export {
  type ClientConfig,
  type ClientConfigInput,
  clientConfigSchema,
  configFromEnv,
  DEFAULT_BASE_URL,
  DEFAULT_CLIENT_CONFIG,
  parseClientConfig,
} from './config/config.js';

/**
 * Client for the PubChem PUG REST service, the process-wide default instance and
 * the response schemas of its typed helpers.
 */
export * from './core/index.js';

/**
 * Typed errors, their guards and extractors, {@link errorKind} and the error strategy.
 */
export * from './error/index.js';

/**
 * Default HTTP provider, replaceable through {@link PubChemClientProps.fetchProvider}.
 */
export { FetchClient } from './fetch/client.js';

/**
 * Logger factory; any winston `Logger` can be passed to a client.
 */
export { createClientLogger, getDefaultLogger, type Logger, type LogLevel, resolveLogLevel } from './logger/logger.js';

/**
 * Request vocabulary: domains, namespaces, identifiers, operations, outputs and the
 * URL builder.
 */
export * from './request/index.js';

/**
 * Contract for custom HTTP providers.
 */
export type {
  FetchClientOptions,
  FetchClientProvider,
  FetchClientProviderDefinition,
  FetchOptions,
  FetchPostOptions,
  FetchResponse,
  HeaderOptions,
} from './types/request.js';

/**
 * Response classification and the retry loop used by the client.
 */
export { classifyResponse, outcomeToResult, type ResponseOutcome } from './utils/classifyResponse.js';
export { type Backoff, linearBackoff, type RetryEvent, type RetryOptions, retry } from './utils/retry.js';

/** Error-first tuple results. */
export type { SafeWrap, SafeWrapAsync } from './utils/wrap.js';
