export { createLogger, withLevel } from './pino';
export { LogLevel } from './types';
export type { CreateLoggerOptions, LogFn, Logger } from './types';
