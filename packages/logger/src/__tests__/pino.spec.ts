import { beforeEach, describe, expect, it, vi } from 'vitest';
import { LogLevel, type Logger } from '../types';

vi.mock('pino', () => ({
  pino: vi.fn((options) => ({
    _options: options,
    level: options.level,
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    fatal: vi.fn(),
    trace: vi.fn(),
  })),
}));

describe('Pino Logger', () => {
  let pinoMock: any;

  beforeEach(async () => {
    vi.clearAllMocks();
    const pinoModule = await import('pino');
    pinoMock = pinoModule.pino;
  });

  describe('createLogger', () => {
    it('should default to the info level', async () => {
      const { createLogger } = await import('../pino');

      createLogger({});

      const callArgs = pinoMock.mock.calls[pinoMock.mock.calls.length - 1][0];
      expect(callArgs.level).toBe('info');
      expect(callArgs.name).toBeUndefined();
    });

    it('should pass level and name through', async () => {
      const { createLogger } = await import('../pino');

      createLogger({ level: LogLevel.Silent, name: 'fixtures' });

      const callArgs = pinoMock.mock.calls[pinoMock.mock.calls.length - 1][0];
      expect(callArgs.level).toBe('silent');
      expect(callArgs.name).toBe('fixtures');
    });

    it('should use pino-pretty outside production', async () => {
      const { createLogger } = await import('../pino');
      const originalEnv = process.env.NODE_ENV;
      process.env.NODE_ENV = 'development';

      createLogger({ pretty: true });

      expect(pinoMock).toHaveBeenCalledWith(
        expect.objectContaining({
          transport: {
            target: 'pino-pretty',
            options: { colorize: true },
          },
        }),
      );

      process.env.NODE_ENV = originalEnv;
    });

    it('should not pretty print in production', async () => {
      const { createLogger } = await import('../pino');
      const originalEnv = process.env.NODE_ENV;
      process.env.NODE_ENV = 'production';

      createLogger({ pretty: true });

      const callArgs = pinoMock.mock.calls[pinoMock.mock.calls.length - 1][0];
      expect(callArgs.transport).toBeUndefined();

      process.env.NODE_ENV = originalEnv;
    });

    it('should upper-case level labels', async () => {
      const { createLogger } = await import('../pino');

      createLogger({});

      const callArgs = pinoMock.mock.calls[pinoMock.mock.calls.length - 1][0];
      expect(callArgs.formatters.level('debug')).toEqual({ level: 'DEBUG' });
      expect(callArgs.formatters.bindings()).toEqual({
        nodeVersion: process.version,
      });
    });
  });

  describe('withLevel', () => {
    const createStubLogger = (): Logger => {
      const logger: Logger = {
        level: 'silent',
        debug: vi.fn(),
        info: vi.fn(),
        warn: vi.fn(),
        error: vi.fn(),
        fatal: vi.fn(),
        trace: vi.fn(),
        child: vi.fn(() => logger),
      };
      return logger;
    };

    it('should raise the level for the duration of the callback', async () => {
      const { withLevel } = await import('../pino');
      const logger = createStubLogger();

      const seen = withLevel(logger, LogLevel.Debug, () => logger.level);

      expect(seen).toBe('debug');
      expect(logger.level).toBe('silent');
    });

    it('should restore the level when the callback throws', async () => {
      const { withLevel } = await import('../pino');
      const logger = createStubLogger();

      expect(() =>
        withLevel(logger, LogLevel.Trace, () => {
          throw new Error('boom');
        }),
      ).toThrow('boom');
      expect(logger.level).toBe('silent');
    });
  });
});
