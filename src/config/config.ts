import { z } from 'zod';
import type { ValidationError } from '../error/validationError.js';
import { validatorSync } from '../utils/validator.js';
import type { SafeWrap } from '../utils/wrap.js';

export const DEFAULT_BASE_URL = 'https://pubchem.ncbi.nlm.nih.gov/rest/pug';

/** Settings a client is built from; see {@link clientConfigSchema} for the defaults. */
export interface ClientConfig {
  /** Service root that request paths are appended to */
  baseUrl: string;
  /** Per-attempt timeout in milliseconds, `0` disables it */
  timeout: number;
  /** Retries after the first attempt for throttled or unavailable responses */
  maxRetries: number;
  /** Base wait in milliseconds; attempt `n` waits `retryDelay * n` */
  retryDelay: number;
  /** Headers sent with every request */
  headers: Record<string, string>;
}

export const DEFAULT_CLIENT_CONFIG: Readonly<ClientConfig> = {
  baseUrl: DEFAULT_BASE_URL,
  timeout: 30_000,
  maxRetries: 3,
  retryDelay: 500,
  headers: {},
};

const millis = z.number().int().nonnegative();

export const clientConfigSchema = z.object({
  baseUrl: z.string().url().default(DEFAULT_CLIENT_CONFIG.baseUrl),
  timeout: millis.default(DEFAULT_CLIENT_CONFIG.timeout),
  maxRetries: z.number().int().nonnegative().default(DEFAULT_CLIENT_CONFIG.maxRetries),
  retryDelay: millis.default(DEFAULT_CLIENT_CONFIG.retryDelay),
  headers: z.record(z.string()).default({}),
});

/** Partial config accepted from callers; missing fields take their defaults. */
export type ClientConfigInput = z.input<typeof clientConfigSchema>;

/** Validate caller-provided settings and fill in defaults. */
export function parseClientConfig(input: ClientConfigInput = {}): SafeWrap<ValidationError, ClientConfig> {
  return validatorSync(input, clientConfigSchema, 'error validating client config');
}

const envInteger = z
  .string()
  .regex(/^\d+$/, 'expected a non-negative integer')
  .transform((value) => Number(value))
  .optional();

const envSchema = z.object({
  PUGWIRE_TIMEOUT_MS: envInteger,
  PUGWIRE_MAX_RETRIES: envInteger,
  PUGWIRE_RETRY_DELAY_MS: envInteger,
  PUGWIRE_BASE_URL: z.string().url().optional(),
});

/** Environment variables read by {@link configFromEnv}. */
export type ConfigEnv = Readonly<Record<string, string | undefined>>;

/**
 * Build a client config from `PUGWIRE_TIMEOUT_MS`, `PUGWIRE_MAX_RETRIES`,
 * `PUGWIRE_RETRY_DELAY_MS` and `PUGWIRE_BASE_URL`. Unset variables keep the defaults.
 */
export function configFromEnv(env: ConfigEnv = process.env): SafeWrap<ValidationError, ClientConfig> {
  const [err, vars] = validatorSync(env, envSchema, 'error reading environment config');
  if (err) {
    return [err, null];
  }

  return parseClientConfig({
    baseUrl: vars.PUGWIRE_BASE_URL,
    timeout: vars.PUGWIRE_TIMEOUT_MS,
    maxRetries: vars.PUGWIRE_MAX_RETRIES,
    retryDelay: vars.PUGWIRE_RETRY_DELAY_MS,
  });
}
