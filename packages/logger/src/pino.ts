/**
 * Pino-backed logger.
 *
 * @example
 * ```typescript
 * import { createLogger, LogLevel } from '@fixturekit/logger';
 *
 * const logger = createLogger({ level: LogLevel.Debug, name: 'fixtures' });
 * logger.debug({ factory: 'UserFactory' }, 'Generating object');
 * ```
 *
 * @module
 */
import { pino } from 'pino';
import { type CreateLoggerOptions, type Logger, LogLevel } from './types';

/**
 * Creates a pino logger instance.
 *
 * @param options - Logger configuration options
 * @returns A configured logger
 *
 * @example
 * ```typescript
 * // Quiet unless something goes wrong
 * const logger = createLogger({ level: LogLevel.Warn });
 *
 * // Pretty printing while debugging a factory
 * const devLogger = createLogger({ pretty: true, level: LogLevel.Trace });
 * ```
 */
export function createLogger(options: CreateLoggerOptions = {}): Logger {
  const pretty = options.pretty === true && process.env.NODE_ENV !== 'production';
  const baseOptions = pretty
    ? {
        transport: {
          target: 'pino-pretty',
          options: { colorize: true },
        },
      }
    : {};

  return pino({
    ...baseOptions,
    level: options.level ?? LogLevel.Info,
    ...(options.name ? { name: options.name } : {}),
    formatters: {
      bindings() {
        return { nodeVersion: process.version };
      },
      level: (label) => {
        return { level: label.toUpperCase() };
      },
    },
  });
}

/**
 * Runs `fn` with the logger raised to `level`, restoring the previous level
 * afterwards even when `fn` throws.
 */
export function withLevel<T>(logger: Logger, level: LogLevel, fn: () => T): T {
  const previous = logger.level;
  logger.level = level;
  try {
    return fn();
  } finally {
    logger.level = previous;
  }
}
