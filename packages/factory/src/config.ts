import { LogLevel } from '@fixturekit/logger';
import { z } from 'zod/v4';

const environmentSchema = z.object({
  FIXTUREKIT_LOG_LEVEL: z.enum(LogLevel).default(LogLevel.Silent),
  FIXTUREKIT_LOG_PRETTY: z.stringbool().default(false),
  FIXTUREKIT_RANDOM_SEED: z.coerce.number().int().optional(),
});

export type FactoryConfig = {
  /** Level of the engine logger, `silent` unless asked otherwise */
  logLevel: LogLevel;
  /** Pretty-print log records through pino-pretty */
  logPretty: boolean;
  /** Seed applied to the default random state when the package loads */
  randomSeed?: number;
};

/**
 * Reads the engine configuration from environment variables.
 *
 * @param env - Variables to read, `process.env` by default
 * @throws z.ZodError when a variable holds an invalid value
 *
 * @example
 * ```typescript
 * // FIXTUREKIT_LOG_LEVEL=debug FIXTUREKIT_RANDOM_SEED=42 vitest
 * const config = parseConfig();
 * config.logLevel;   // 'debug'
 * config.randomSeed; // 42
 * ```
 */
export function parseConfig(
  env: Record<string, string | undefined> = process.env,
): FactoryConfig {
  const parsed = environmentSchema.parse(env);

  return {
    logLevel: parsed.FIXTUREKIT_LOG_LEVEL,
    logPretty: parsed.FIXTUREKIT_LOG_PRETTY,
    randomSeed: parsed.FIXTUREKIT_RANDOM_SEED,
  };
}

/** Configuration the package was loaded with */
export const config: FactoryConfig = parseConfig();
