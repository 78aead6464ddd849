import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { createLogger, getLogLevel, isLogLevel, setLogLevel, type LogLevel } from '../../src/utils/logger.js';

describe('createLogger', () => {
  let initial: LogLevel;

  beforeEach(() => {
    initial = getLogLevel();
  });

  afterEach(() => {
    setLogLevel(initial);
    vi.restoreAllMocks();
  });

  it('writes enabled levels with their scope', () => {
    const spy = vi.spyOn(console, 'error').mockImplementation(() => {});
    setLogLevel('info');
    const log = createLogger('driver');

    log.info('Running 3 programs');
    log.debug('hidden');

    expect(spy).toHaveBeenCalledTimes(1);
    expect(String(spy.mock.calls[0][0])).toMatch(/INFO.* \[driver\] Running 3 programs$/);
  });

  it('stays quiet below the configured level', () => {
    const spy = vi.spyOn(console, 'error').mockImplementation(() => {});
    setLogLevel('error');

    createLogger('x').warn('nope');

    expect(spy).not.toHaveBeenCalled();
  });
});

describe('isLogLevel', () => {
  it('accepts only known levels', () => {
    expect(isLogLevel('debug')).toBe(true);
    expect(isLogLevel('trace')).toBe(false);
    expect(isLogLevel(undefined)).toBe(false);
  });
});
