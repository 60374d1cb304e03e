import { createLogger, resolveLogLevel, setLogLevel } from './logger';

describe('Logger', () => {
  describe('resolveLogLevel', () => {
    it('should prefer an explicit level', () => {
      expect(resolveLogLevel('debug', { LOG_LEVEL: 'error', NODE_ENV: 'test' })).toBe('debug');
    });

    it('should read LOG_LEVEL when no level is given', () => {
      expect(resolveLogLevel(undefined, { LOG_LEVEL: 'warn' })).toBe('warn');
    });

    it('should ignore an unknown LOG_LEVEL', () => {
      expect(resolveLogLevel(undefined, { LOG_LEVEL: 'loud' })).toBe('info');
    });

    it('should be silent under NODE_ENV=test', () => {
      expect(resolveLogLevel(undefined, { NODE_ENV: 'test' })).toBe('silent');
    });
  });

  describe('createLogger', () => {
    const errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    const warnSpy = jest.spyOn(console, 'warn').mockImplementation(() => undefined);

    afterEach(() => {
      errorSpy.mockClear();
      warnSpy.mockClear();
    });

    afterAll(() => {
      errorSpy.mockRestore();
      warnSpy.mockRestore();
    });

    it('should prefix messages and write progress to stderr', () => {
      const log = createLogger('[Test] ', 'info');

      log.info('hello', 42);

      expect(errorSpy).toHaveBeenCalledWith('[Test] hello', 42);
    });

    it('should drop messages below the configured level', () => {
      const log = createLogger('[Test] ', 'warn');

      log.debug('hidden');
      log.info('hidden');
      log.warn('shown');

      expect(errorSpy).not.toHaveBeenCalled();
      expect(warnSpy).toHaveBeenCalledWith('[Test] shown');
    });

    it('should follow setLogLevel when created without a level', () => {
      const log = createLogger('[Test] ');

      log.info('before');
      setLogLevel('debug');
      log.debug('after');
      setLogLevel(undefined);

      expect(errorSpy).toHaveBeenCalledTimes(1);
      expect(errorSpy).toHaveBeenCalledWith('[Test] after');
    });

    it('should log nothing when silent', () => {
      const log = createLogger('', 'silent');

      log.error('nope');

      expect(errorSpy).not.toHaveBeenCalled();
    });
  });
});
