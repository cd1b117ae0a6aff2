import { logger, LogLevel, parseLogLevel } from '../utils/logger';

describe('Logger', () => {
  afterEach(() => {
    logger.setLogLevel(LogLevel.INFO);
    logger.setTimestamps(false);
  });

  it('should drop messages below the current level', () => {
    logger.setLogLevel(LogLevel.WARN);

    logger.debug('hidden');
    logger.info('hidden');
    logger.warn('shown');
    logger.error('shown');

    expect(console.log).toHaveBeenCalledTimes(2);
  });

  it('should print nothing when silent', () => {
    logger.setLogLevel(LogLevel.SILENT);

    logger.error('hidden');
    logger.stats({ Completed: 1 });

    expect(console.log).not.toHaveBeenCalled();
  });

  it('should print one line per stat', () => {
    logger.stats({ Completed: 3, Failed: 0 });

    expect(console.log).toHaveBeenCalledTimes(2);
  });

  it('should parse level names case-insensitively', () => {
    expect(parseLogLevel('DEBUG')).toBe(LogLevel.DEBUG);
    expect(parseLogLevel('warn')).toBe(LogLevel.WARN);
    expect(() => parseLogLevel('verbose')).toThrow('Unknown log level: verbose');
    expect(() => parseLogLevel('toString')).toThrow('Unknown log level: toString');
  });
});
