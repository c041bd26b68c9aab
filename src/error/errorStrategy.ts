import { InvalidInputError } from './invalidInputError.js';
import { ParseResponseError } from './parseResponseError.js';

/**
 * How locally built errors are delivered:
 * - `normal` returns them as values
 * - `backtrace` returns them with the creation stack appended to the message
 * - `panic` throws them at the construction site
 */
export type ErrorStrategy = 'normal' | 'backtrace' | 'panic';

/** Environment variables read by {@link resolveErrorStrategy}. */
export type ErrorStrategyEnv = Readonly<Record<string, string | undefined>>;

/**
 * Resolve the error strategy from environment variables. `PUGWIRE_PANIC_ON_ERR=1`
 * wins over `PUGWIRE_BACKTRACE_IN_ERR=1`.
 */
export function resolveErrorStrategy(env: ErrorStrategyEnv): ErrorStrategy {
  if (env.PUGWIRE_PANIC_ON_ERR === '1') {
    return 'panic';
  }
  if (env.PUGWIRE_BACKTRACE_IN_ERR === '1') {
    return 'backtrace';
  }
  return 'normal';
}

let processStrategy: ErrorStrategy | null = null;

/**
 * Process-wide strategy, read from `process.env` once and cached for the lifetime
 * of the process.
 */
export function errorStrategy(): ErrorStrategy {
  processStrategy ??= resolveErrorStrategy(process.env);
  return processStrategy;
}

function applyStrategy<E extends Error>(err: E, strategy: ErrorStrategy): E {
  switch (strategy) {
    case 'normal':
      return err;
    case 'backtrace': {
      const frames = (err.stack ?? '').split('\n').slice(1).join('\n');
      if (frames) {
        err.message = `${err.message}\n${frames}`;
      }
      return err;
    }
    case 'panic':
      throw err;
  }
}

/** Build an {@link InvalidInputError} under the given strategy. */
export function invalidInput(message: string, strategy: ErrorStrategy = errorStrategy()): InvalidInputError {
  return applyStrategy(new InvalidInputError(message), strategy);
}

/** Build a {@link ParseResponseError} under the given strategy. */
export function parseResponse(
  message: string,
  opts?: ErrorOptions,
  strategy: ErrorStrategy = errorStrategy(),
): ParseResponseError {
  return applyStrategy(new ParseResponseError(message, opts), strategy);
}
