// Unit tests for LoggerService level handling
import { logger, resolveLogLevel } from '../../../src/infrastructure/monitoring/logger.service';

describe('resolveLogLevel', () => {
  it('uses a known LOG_LEVEL', () => {
    expect(resolveLogLevel('warn', 'production')).toBe('warn');
    expect(resolveLogLevel('silent', 'development')).toBe('silent');
  });

  it('falls back to the environment default for unknown or missing values', () => {
    expect(resolveLogLevel('verbose', 'production')).toBe('info');
    expect(resolveLogLevel(undefined, 'development')).toBe('debug');
    expect(resolveLogLevel('', 'test')).toBe('silent');
  });
});

describe('LoggerService', () => {
  const initial = logger.level;

  afterEach(() => {
    logger.setLevel('silent');
  });

  it('starts at the level from the environment', () => {
    expect(initial).toBe('silent');
  });

  it('switches to the configured level', () => {
    logger.setLevel('error');

    expect(logger.level).toBe('error');
  });
});
