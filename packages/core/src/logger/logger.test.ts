import { createLogger, isLogLevel } from './logger';

describe('createLogger', () => {
  const originalLogLevel = process.env['LOG_LEVEL'];
  let logSpy: jest.SpyInstance;
  let warnSpy: jest.SpyInstance;

  beforeEach(() => {
    logSpy = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    warnSpy = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
    if (originalLogLevel === undefined) {
      delete process.env['LOG_LEVEL'];
    } else {
      process.env['LOG_LEVEL'] = originalLogLevel;
    }
  });

  it('should prefix messages and pass extra arguments through', () => {
    const logger = createLogger('[Test] ', 'debug');

    logger.info('extracted', 3);

    expect(logSpy).toHaveBeenCalledWith('[Test] extracted', 3);
  });

  it('should drop messages below the configured level', () => {
    const logger = createLogger('', 'warn');

    logger.info('hidden');
    logger.warn('shown');

    expect(logSpy).not.toHaveBeenCalled();
    expect(warnSpy).toHaveBeenCalledWith('shown');
  });

  it('should send errors to stderr and drop debug output at the info level', () => {
    const errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    const logger = createLogger('[Test] ', 'info');

    logger.debug('hidden');
    logger.error('failed', 'runc');

    expect(logSpy).not.toHaveBeenCalled();
    expect(errorSpy).toHaveBeenCalledWith('[Test] failed', 'runc');
  });

  it('should stay silent under the test runner when no level is given', () => {
    process.env['LOG_LEVEL'] = 'debug';

    createLogger('').error('hidden');
    createLogger('').info('hidden');

    expect(logSpy).not.toHaveBeenCalled();
  });
});

describe('isLogLevel', () => {
  it('should accept known levels only', () => {
    expect(isLogLevel('warn')).toBe(true);
    expect(isLogLevel('verbose')).toBe(false);
    expect(isLogLevel(undefined)).toBe(false);
  });
});
