import { createLogger, resolveLogLevel, isLogLevel } from './logger';

describe('Logger', () => {
  const originalEnv = { ...process.env };

  afterEach(() => {
    process.env = { ...originalEnv };
    jest.restoreAllMocks();
  });

  describe('resolveLogLevel', () => {
    it('should prefer an explicit level', () => {
      process.env['NODE_ENV'] = 'test';
      expect(resolveLogLevel('debug')).toBe('debug');
    });

    it('should be silent under NODE_ENV=test', () => {
      process.env['NODE_ENV'] = 'test';
      process.env['LOG_LEVEL'] = 'debug';
      expect(resolveLogLevel()).toBe('silent');
    });

    it('should read LOG_LEVEL outside of tests', () => {
      process.env['NODE_ENV'] = 'production';
      process.env['LOG_LEVEL'] = 'warn';
      expect(resolveLogLevel()).toBe('warn');
    });

    it('should fall back to info for an unknown LOG_LEVEL', () => {
      process.env['NODE_ENV'] = 'production';
      process.env['LOG_LEVEL'] = 'loud';
      expect(resolveLogLevel()).toBe('info');
    });
  });

  describe('isLogLevel', () => {
    it('should accept known levels only', () => {
      expect(isLogLevel('error')).toBe(true);
      expect(isLogLevel('trace')).toBe(false);
      expect(isLogLevel(3)).toBe(false);
    });
  });

  describe('createLogger', () => {
    it('should prefix messages and filter below the configured level', () => {
      const log = jest.spyOn(console, 'log').mockImplementation(() => undefined);
      const warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);

      const logger = createLogger('[Test] ', 'warn');
      logger.info('hidden');
      logger.warn('shown', 42);

      expect(log).not.toHaveBeenCalled();
      expect(warn).toHaveBeenCalledWith('[Test] shown', 42);
    });

    it('should expose only the logging methods, with the level fixed at creation', () => {
      const logger = createLogger('[Test] ', 'info');

      expect(Object.getOwnPropertyNames(Object.getPrototypeOf(logger)).sort()).toEqual([
        'constructor',
        'debug',
        'error',
        'info',
        'shouldLog',
        'warn',
      ]);
    });

    it('should print nothing when silent', () => {
      const error = jest.spyOn(console, 'error').mockImplementation(() => undefined);

      createLogger('', 'silent').error('nope');

      expect(error).not.toHaveBeenCalled();
    });
  });
});
