import { createLogger, format, type Logger, transports } from 'winston';

export type { Logger };

/** npm log levels understood by winston, most severe first. */
export const LOG_LEVELS = ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export const DEFAULT_LOG_LEVEL: LogLevel = 'warn';

/** Level from `PUGWIRE_LOG_LEVEL`, falling back to `warn` when unset or unknown. */
export function resolveLogLevel(env: Readonly<Record<string, string | undefined>>): LogLevel {
  const wanted = env.PUGWIRE_LOG_LEVEL?.trim().toLowerCase();
  return LOG_LEVELS.find((level) => level === wanted) ?? DEFAULT_LOG_LEVEL;
}

/**
 * Console logger used by clients that are not given one. Structured JSON with
 * timestamps and error stacks; the console transport prints a colorized summary.
 */
export function createClientLogger(level: LogLevel = resolveLogLevel(process.env)): Logger {
  return createLogger({
    level,
    format: format.combine(format.timestamp(), format.errors({ stack: true }), format.json()),
    transports: [
      new transports.Console({
        format: format.combine(format.colorize(), format.simple()),
      }),
    ],
  });
}

let defaultLogger: Logger | null = null;

/** Process-wide logger, created on first use. */
export function getDefaultLogger(): Logger {
  if (!defaultLogger) {
    defaultLogger = createClientLogger();
  }
  return defaultLogger;
}
