import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { createLogger, getLogLevel, isLogLevel, setLogLevel } from './logger';

beforeEach(() => {
  vi.useFakeTimers();
  vi.setSystemTime(new Date('2024-01-02T03:04:05.000Z'));
});

afterEach(() => {
  setLogLevel('info');
  vi.useRealTimers();
  vi.restoreAllMocks();
});

describe('createLogger', () => {
  it('prefixes lines with time, level and module', () => {
    const info = vi.spyOn(console, 'info').mockImplementation(() => {});
    const payload = { lives: 3 };

    createLogger('arkanoid').info('Status changed', payload);

    expect(info).toHaveBeenCalledWith('[2024-01-02T03:04:05.000Z] [INFO] [arkanoid] Status changed', payload);
  });

  it('drops messages below the current level', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => {});
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const log = createLogger('test');

    log.debug('hidden');
    expect(debug).not.toHaveBeenCalled();

    setLogLevel('error');
    log.warn('also hidden');
    expect(warn).not.toHaveBeenCalled();
  });

  it('picks up level changes after creation', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => {});
    const log = createLogger('test');

    setLogLevel('debug');
    log.debug('now visible');
    expect(debug).toHaveBeenCalledWith('[2024-01-02T03:04:05.000Z] [DEBUG] [test] now visible');
  });
});

describe('log levels', () => {
  it('defaults to info', () => {
    expect(getLogLevel()).toBe('info');
  });

  it('recognizes only the known level names', () => {
    expect(isLogLevel('warn')).toBe(true);
    expect(isLogLevel('verbose')).toBe(false);
    expect(isLogLevel('toString')).toBe(false);
  });
});
