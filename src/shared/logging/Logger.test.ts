import { describe, it, expect, jest, beforeEach, afterEach } from '@jest/globals';
import { ConsoleLogger, LoggerFactory, LogLevel, parseLogLevel } from './Logger';

describe('ConsoleLogger', () => {
  let logSpy: jest.SpiedFunction<typeof console.log>;
  let infoSpy: jest.SpiedFunction<typeof console.info>;
  let debugSpy: jest.SpiedFunction<typeof console.debug>;

  beforeEach(() => {
    logSpy = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    infoSpy = jest.spyOn(console, 'info').mockImplementation(() => undefined);
    debugSpy = jest.spyOn(console, 'debug').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
    LoggerFactory.clear();
    LoggerFactory.setDefaultConfig({ level: LogLevel.INFO });
  });

  it('should write plain lines without timestamp or colour when asked', () => {
    const logger = new ConsoleLogger({ name: 'Scheduler', timestamp: false, colorize: false });

    logger.info('Batch 1 settled');

    expect(infoSpy).toHaveBeenCalledWith('[INFO] [Scheduler] Batch 1 settled');
  });

  it('should drop entries below its level', () => {
    const logger = new ConsoleLogger({ level: LogLevel.INFO });

    logger.debug('hidden');
    expect(debugSpy).not.toHaveBeenCalled();

    logger.setLevel('debug');
    logger.debug('shown');
    expect(debugSpy).toHaveBeenCalledTimes(1);
    expect(logger.getLevel()).toBe(LogLevel.DEBUG);
  });

  it('should ignore unknown level names', () => {
    const logger = new ConsoleLogger({ level: LogLevel.WARN });

    logger.setLevel('loud');

    expect(logger.getLevel()).toBe(LogLevel.WARN);
  });

  it('should write one JSON object per entry in JSON mode', () => {
    const logger = new ConsoleLogger({ name: 'Http', json: true });

    logger.warn('Rate limited', { seconds: 7 });

    expect(logSpy).toHaveBeenCalledTimes(1);
    const written = logSpy.mock.calls[0][0];
    expect(typeof written === 'string' ? JSON.parse(written) : undefined).toMatchObject({
      level: 'WARN',
      logger: 'Http',
      message: 'Rate limited',
      meta: { seconds: 7 }
    });
  });

  it('should hand out one logger per name and re-level them together', () => {
    const logger = LoggerFactory.getLogger('Download');

    expect(LoggerFactory.getLogger('Download')).toBe(logger);

    LoggerFactory.setDefaultConfig({ level: LogLevel.DEBUG });
    expect(logger instanceof ConsoleLogger ? logger.getLevel() : undefined).toBe(LogLevel.DEBUG);
  });

  it('should parse level names case-insensitively', () => {
    expect(parseLogLevel('Warn')).toBe(LogLevel.WARN);
    expect(parseLogLevel('silent')).toBe(LogLevel.SILENT);
    expect(parseLogLevel('verbose')).toBeUndefined();
  });
});
