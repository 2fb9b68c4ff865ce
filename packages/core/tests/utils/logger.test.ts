import { describe, it, expect, vi } from 'vitest';
import { createLogger, isLogLevel, silentLogger } from '../../src/utils/logger.js';

const createSink = () => ({
  debug: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
});

describe('createLogger', () => {
  it('should drop messages below the threshold', () => {
    const sink = createSink();
    const logger = createLogger('warn', sink);

    logger.debug('noise');
    logger.info('noise');
    logger.warn('careful', { rule: 'min' });
    logger.error('boom');

    expect(sink.debug).not.toHaveBeenCalled();
    expect(sink.info).not.toHaveBeenCalled();
    expect(sink.warn).toHaveBeenCalledWith('[tagvalid] careful', { rule: 'min' });
    expect(sink.error).toHaveBeenCalledWith('[tagvalid] boom');
  });

  it('should omit empty metadata', () => {
    const sink = createSink();
    createLogger('debug', sink).info('hello', {});
    expect(sink.info).toHaveBeenCalledWith('[tagvalid] hello');
  });

  it('should emit everything at debug', () => {
    const sink = createSink();
    const logger = createLogger('debug', sink);
    logger.debug('a');
    logger.info('b');
    expect(sink.debug).toHaveBeenCalledWith('[tagvalid] a');
    expect(sink.info).toHaveBeenCalledWith('[tagvalid] b');
  });

  it('should emit nothing when silent', () => {
    const sink = createSink();
    createLogger('silent', sink).error('boom');
    expect(sink.error).not.toHaveBeenCalled();
  });
});

describe('isLogLevel', () => {
  it('should recognize known levels only', () => {
    expect(isLogLevel('warn')).toBe(true);
    expect(isLogLevel('silent')).toBe(true);
    expect(isLogLevel('verbose')).toBe(false);
    expect(isLogLevel(3)).toBe(false);
  });
});

describe('silentLogger', () => {
  it('should accept calls without output', () => {
    expect(silentLogger.error('boom', { a: 1 })).toBeUndefined();
  });
});
