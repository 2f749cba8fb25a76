import { afterEach, describe, expect, test, vi } from 'vitest';

import { Logger } from './index';

describe('Logger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  test('delegates to the provided methods', () => {
    const info = vi.fn();
    const logger = new Logger({
      debug: vi.fn(),
      info,
      warn: vi.fn(),
      error: vi.fn(),
    });

    logger.info('[Test] hello', 42);

    expect(info).toHaveBeenCalledWith('[Test] hello', 42);
  });

  test('console logger drops messages below the minimum level', () => {
    const debugSpy = vi.spyOn(console, 'debug').mockImplementation(() => {});
    const infoSpy = vi.spyOn(console, 'info').mockImplementation(() => {});
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});

    const logger = Logger.console('info');
    logger.debug('hidden');
    logger.info('shown');
    logger.warn('also shown');

    expect(debugSpy).not.toHaveBeenCalled();
    expect(infoSpy).toHaveBeenCalledWith('shown');
    expect(warnSpy).toHaveBeenCalledWith('also shown');
  });

  test('console logger at error level only forwards errors', () => {
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});

    const logger = Logger.console('error');
    logger.warn('hidden');
    logger.error('boom');

    expect(warnSpy).not.toHaveBeenCalled();
    expect(errorSpy).toHaveBeenCalledWith('boom');
  });

  test('silent logger never reaches the console', () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});

    Logger.silent().error('nothing');

    expect(errorSpy).not.toHaveBeenCalled();
  });
});
