/**
 * Logging function type that supports both structured and simple logging.
 *
 * @example
 * ```typescript
 * logger.debug({ factory: 'UserFactory', sequence: 3 }, 'Generating object');
 * logger.info('Sequences reset');
 * ```
 */
export type LogFn = {
  /** Structured logging with context object, optional message, and additional arguments */
  <T extends object>(obj: T, msg?: string, ...args: unknown[]): void;
  /** Simple string logging */
  (msg: string): void;
};

/**
 * Logger contract shared by every fixturekit package.
 * Level is writable so callers can raise verbosity for a single block of work.
 */
export interface Logger {
  /** Current minimum level, one of {@link LogLevel} */
  level: string;
  trace: LogFn;
  debug: LogFn;
  info: LogFn;
  warn: LogFn;
  error: LogFn;
  fatal: LogFn;
  /**
   * Creates a child logger with additional bindings.
   * Child loggers inherit parent bindings and add their own.
   */
  child: (bindings: Record<string, unknown>) => Logger;
}

export enum LogLevel {
  Trace = 'trace',
  Debug = 'debug',
  Info = 'info',
  Warn = 'warn',
  Error = 'error',
  Fatal = 'fatal',
  Silent = 'silent',
}

export type CreateLoggerOptions = {
  /** Pretty-print through pino-pretty, ignored when NODE_ENV is production */
  pretty?: boolean;
  level?: LogLevel;
  /** Name attached to every record */
  name?: string;
};
