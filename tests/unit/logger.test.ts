import { describe, it, expect, vi, afterEach } from 'vitest';
import { createLogger, preview, setLogLevel } from '../../src/logger.js';

describe('createLogger', () => {
  afterEach(() => {
    setLogLevel('info');
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  it('prefixes time, level and scope', () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2026-03-01T10:00:00.000Z'));
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});

    const logger = createLogger('Gallery');
    logger.info('saved 2 image(s)');
    logger.error('disk full');

    expect(log).toHaveBeenCalledWith('2026-03-01T10:00:00.000Z | INFO | [Gallery]', 'saved 2 image(s)');
    expect(error).toHaveBeenCalledWith('2026-03-01T10:00:00.000Z | ERROR | [Gallery]', 'disk full');
  });

  it('drops messages below the threshold', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    setLogLevel('warn');

    const logger = createLogger('Inference');
    logger.info('hidden');
    logger.warn('shown');
    expect(log).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledTimes(1);
  });
});

describe('preview', () => {
  it('shortens long text', () => {
    expect(preview('short')).toBe('short');
    expect(preview('abcdefghij', 4)).toBe('abcd...');
  });
});
