import { Logger, logLevelFromEnvironment } from '../lib/runtime/logger';

describe('Logger', () => {
  let log: jest.SpyInstance;
  let warn: jest.SpyInstance;
  let error: jest.SpyInstance;

  beforeEach(() => {
    log = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    error = jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  test('prefixes messages with timestamp, level and service', () => {
    new Logger('relay', 'DEBUG').info('Message received', { itemId: 'batch-001.csv' });

    expect(log).toHaveBeenCalledTimes(1);
    expect(log.mock.calls[0][0]).toMatch(
      /^\[\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z\] \[INFO\] \[relay\] Message received \{"itemId":"batch-001.csv"\}$/,
    );
  });

  test('omits empty metadata', () => {
    new Logger('relay', 'DEBUG').debug('Polling');

    expect(log.mock.calls[0][0]).toMatch(/\[DEBUG\] \[relay\] Polling$/);
  });

  test('drops messages below the threshold', () => {
    const logger = new Logger('relay', 'WARNING');
    logger.debug('hidden');
    logger.info('hidden');
    logger.warn('Retrying');

    expect(log).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn.mock.calls[0][0]).toMatch(/\[WARNING\] \[relay\] Retrying$/);
  });

  test('always writes errors', () => {
    new Logger('relay', 'ERROR').error('Dead-lettered', { itemId: 'a' });

    expect(error).toHaveBeenCalledTimes(1);
    expect(error.mock.calls[0][0]).toMatch(/\[ERROR\] \[relay\] Dead-lettered \{"itemId":"a"\}$/);
  });

  test('merges context into every entry', () => {
    const logger = new Logger('relay', 'INFO');
    logger.setContext({ queue: 'ingest-queue' });
    logger.info('Message received', { itemId: 'a' });

    expect(log.mock.calls[0][0]).toMatch(/Message received \{"queue":"ingest-queue","itemId":"a"\}$/);
  });
});

describe('logLevelFromEnvironment', () => {
  test.each([
    [undefined, 'INFO'],
    ['debug', 'DEBUG'],
    ['WARN', 'WARNING'],
    ['warning', 'WARNING'],
    ['ERROR', 'ERROR'],
    ['verbose', 'INFO'],
  ])('reads %p as %p', (value, expected) => {
    expect(logLevelFromEnvironment({ CONSOLE_LOG_LEVEL: value })).toBe(expected);
  });
});
