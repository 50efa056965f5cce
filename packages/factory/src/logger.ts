import { createLogger, type Logger, LogLevel, withLevel } from '@fixturekit/logger';
import { config } from './config';

/**
 * Engine logger. Generation steps log at `debug`, attribute resolution at
 * `trace`.
 */
export const logger: Logger = createLogger({
  level: config.logLevel,
  pretty: config.logPretty,
  name: 'fixturekit',
}).child({ module: 'factory' });

/**
 * Traces every generate call made while `fn` runs.
 *
 * @example
 * ```typescript
 * debug(() => CompanyFactory.build({ owner__firstName: 'Henry' }));
 * ```
 */
export function debug<T>(fn: () => T, level: LogLevel = LogLevel.Debug): T {
  return withLevel(logger, level, fn);
}
