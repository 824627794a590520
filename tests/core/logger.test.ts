import { afterEach, describe, expect, it, vi } from 'vitest';

import { Logger, parseLogLevel } from '../../src/core/logger.js';

afterEach(() => {
  vi.restoreAllMocks();
});

describe('Logger', () => {
  it('drops messages below the configured level', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const logger = new Logger('warn');

    logger.info('quiet');
    logger.warn('loud');

    expect(log).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledTimes(1);
    expect(String(warn.mock.calls[0]?.[0])).toMatch(/^\[.+\] WARN: loud$/);
  });

  it('prefixes child scopes and appends error detail', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    const logger = new Logger('debug').child('dispatch');

    logger.error('handler failed', new Error('kaput'));

    const line = String(error.mock.calls[0]?.[0]);
    expect(line).toContain('ERROR: [dispatch] handler failed');
    expect(line).toContain('kaput');
  });

  it('serializes structured detail as json', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    new Logger('info').info('turn', { intent: 'market' });
    expect(String(log.mock.calls[0]?.[0])).toMatch(/INFO: turn \{"intent":"market"\}$/);
  });
});

describe('parseLogLevel', () => {
  it('accepts known levels case-insensitively and falls back otherwise', () => {
    expect(parseLogLevel('DEBUG')).toBe('debug');
    expect(parseLogLevel(' warn ')).toBe('warn');
    expect(parseLogLevel('verbose')).toBe('info');
    expect(parseLogLevel(undefined, 'error')).toBe('error');
  });
});
