import chalk from 'chalk';
import { createLogger } from '../../src/lib/logger';

describe('createLogger', () => {
  let log: jest.SpyInstance;
  let warn: jest.SpyInstance;

  beforeAll(() => {
    chalk.level = 0;
  });

  beforeEach(() => {
    log = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should drop messages below the configured level', () => {
    const logger = createLogger('warn');

    logger.debug('noise');
    logger.info('noise');
    logger.warn('careful');

    expect(log).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn.mock.calls[0][0]).toMatch(/ ⚠ careful$/);
  });

  it('should prefix child loggers with the joined tag', () => {
    createLogger('info', 'Engine').child('Webhook').info('hello');

    expect(log.mock.calls[0][0]).toMatch(/^\d{4}-\d{2}-\d{2}T[\d:.]+Z \[Engine:Webhook\] hello$/);
  });

  it('should stay quiet at the silent level', () => {
    createLogger('silent').warn('hidden');

    expect(warn).not.toHaveBeenCalled();
  });
});
