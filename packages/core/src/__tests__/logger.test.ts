import { describe, it, expect } from 'vitest';
import { getLoggerConfig, createLogger, createSilentLogger } from '../logger.js';

describe('logger', () => {
  it('prefers the explicit level', () => {
    expect(getLoggerConfig('debug', { MODELSTACK_LOG_LEVEL: 'error' }).level).toBe('debug');
  });

  it('reads level and format from the environment', () => {
    const config = getLoggerConfig(undefined, {
      MODELSTACK_LOG_LEVEL: 'info',
      MODELSTACK_LOG_FORMAT: 'json',
    });

    expect(config).toEqual({ level: 'info', format: 'json', silent: false });
  });

  it('ignores unknown levels and is silent under test', () => {
    const config = getLoggerConfig(undefined, { MODELSTACK_LOG_LEVEL: 'loud', NODE_ENV: 'test' });

    expect(config.level).toBe('warn');
    expect(config.format).toBe('simple');
    expect(config.silent).toBe(true);
  });

  it('creates child loggers that accept metadata', () => {
    const logger = createLogger({ silent: true });
    const child = logger.child({ component: 'health' });

    expect(() => child.debug('probe', { url: 'http://localhost:1' })).not.toThrow();
    expect(() => createSilentLogger().error('nothing')).not.toThrow();
  });
});
