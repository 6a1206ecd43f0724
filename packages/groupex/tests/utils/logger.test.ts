import { describe, it, expect, vi, afterEach } from 'vitest';
import { createLogger, isLogLevel } from '../../src/utils/logger.js';

describe('createLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should drop entries below the configured level', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => {});
    const info = vi.spyOn(console, 'info').mockImplementation(() => {});
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});

    const logger = createLogger('warn');
    logger.debug('hidden');
    logger.info('hidden');
    logger.warn('Operator is shadowed', { symbol: '!=' });

    expect(debug).not.toHaveBeenCalled();
    expect(info).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledWith('[groupex] WARN Operator is shadowed {"symbol":"!="}');
  });

  it('should omit empty metadata', () => {
    const info = vi.spyOn(console, 'info').mockImplementation(() => {});
    createLogger('info').info('Filtered lines', {});
    expect(info).toHaveBeenCalledWith('[groupex] INFO Filtered lines');
  });

  it('should print the stack of a logged error', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    const cause = new Error('broken');

    createLogger('debug').error('Failed', { path: 'g.yaml' }, cause);

    expect(error).toHaveBeenNthCalledWith(1, '[groupex] ERROR Failed {"path":"g.yaml"}');
    expect(error).toHaveBeenNthCalledWith(2, cause.stack);
  });

  it('should print nothing when silent', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    createLogger('silent').error('Failed');
    expect(error).not.toHaveBeenCalled();
  });

  it('should recognise log levels', () => {
    expect(isLogLevel('debug')).toBe(true);
    expect(isLogLevel('silent')).toBe(true);
    expect(isLogLevel('loud')).toBe(false);
  });
});
