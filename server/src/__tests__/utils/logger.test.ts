import { resolveLogLevel } from '../../utils/logger';

describe('resolveLogLevel', () => {
  it('should keep known levels', () => {
    expect(resolveLogLevel('debug')).toBe('debug');
    expect(resolveLogLevel('error')).toBe('error');
  });

  it('should fall back to info', () => {
    expect(resolveLogLevel(undefined)).toBe('info');
    expect(resolveLogLevel('')).toBe('info');
    expect(resolveLogLevel('verbose')).toBe('info');
  });
});

describe('logger', () => {
  const savedLevel = process.env.LOG_LEVEL;

  beforeEach(() => {
    jest.resetModules();
  });

  afterEach(() => {
    if (savedLevel === undefined) {
      delete process.env.LOG_LEVEL;
    } else {
      process.env.LOG_LEVEL = savedLevel;
    }
  });

  it('should keep logging at info under an unknown LOG_LEVEL', async () => {
    process.env.LOG_LEVEL = 'bogus';
    const { logger, recentLogs } = await import('../../utils/logger');
    recentLogs.clear();

    logger.debug('hidden');
    logger.info('hello');
    logger.error('boom');
    await new Promise((resolve) => setImmediate(resolve));

    expect(logger.level).toBe('info');
    expect(recentLogs.getLines()).toEqual([
      expect.stringMatching(/^\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2} \[info\]: hello$/),
      expect.stringMatching(/^\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2} \[error\]: boom$/),
    ]);
  });

  it('should honour a valid LOG_LEVEL', async () => {
    process.env.LOG_LEVEL = 'error';
    const { logger, recentLogs } = await import('../../utils/logger');
    recentLogs.clear();

    logger.info('skipped');
    logger.error('kept');
    await new Promise((resolve) => setImmediate(resolve));

    expect(logger.level).toBe('error');
    expect(recentLogs.getLines()).toEqual([expect.stringMatching(/ \[error\]: kept$/)]);
  });
});
