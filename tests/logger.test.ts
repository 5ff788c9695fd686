import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { logger, setLogLevel } from '../src/logger.js';

describe('logger', () => {
  beforeEach(() => {
    setLogLevel('info');
  });

  afterEach(() => {
    vi.restoreAllMocks();
    setLogLevel('info');
  });

  it('hides debug lines at the info level', () => {
    const consoleError = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    logger.debug('hidden');
    logger.info('shown');

    expect(consoleError.mock.calls).toEqual([['[INFO] shown']]);
  });

  it('prints debug lines with JSON metadata once enabled', () => {
    const consoleError = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    setLogLevel('debug');
    logger.debug('ADS search request', { q: 'author:"doe"', rows: 5 });

    expect(consoleError.mock.calls).toEqual([
      ['[DEBUG] ADS search request', '{"q":"author:\\"doe\\"","rows":5}'],
    ]);
  });

  it('drops levels below the threshold and writes everything to stderr', () => {
    const consoleError = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const consoleLog = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const consoleWarn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);

    setLogLevel('warn');
    logger.info('quiet');
    logger.warn('careful');
    logger.error('boom');

    expect(consoleError.mock.calls).toEqual([['[WARN] careful'], ['[ERROR] boom']]);
    expect(consoleLog).not.toHaveBeenCalled();
    expect(consoleWarn).not.toHaveBeenCalled();
  });
});
