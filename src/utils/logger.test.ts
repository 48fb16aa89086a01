import { afterEach, describe, expect, it, vi } from 'vitest';

import { colorize, createLogger } from './logger';

describe('createLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('filters by level', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const logger = createLogger({ level: 'warn', useColors: false });

    logger.info('ignored');
    logger.warn('disk low');

    expect(log).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledWith('WARN  disk low');
  });

  it('writes each level to its console method', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const logger = createLogger({ level: 'debug', useColors: false });

    logger.debug('starting');
    logger.error('failed');

    expect(log).toHaveBeenCalledWith('DEBUG starting');
    expect(error).toHaveBeenCalledWith('ERROR failed');
  });

  it('appends arguments on one line', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const logger = createLogger({ useColors: false });

    logger.info('user', { id: 1 }, 'test-user', 2);

    expect(log).toHaveBeenCalledWith('INFO  user { id: 1 } test-user 2');
  });

  it('colors the level tag', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    createLogger({ level: 'error', useColors: true }).error('boom');

    expect(error).toHaveBeenCalledWith('\x1b[31mERROR\x1b[0m boom');
  });

  it('writes nothing when silent', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    createLogger({ level: 'silent' }).error('x');

    expect(error).not.toHaveBeenCalled();
  });
});

describe('colorize', () => {
  it('wraps text only when enabled', () => {
    expect(colorize('x', 'red', true)).toBe('\x1b[31mx\x1b[0m');
    expect(colorize('x', 'bold', true)).toBe('\x1b[1mx\x1b[0m');
    expect(colorize('x', 'red', false)).toBe('x');
  });
});
