import { describe, it, expect } from 'vitest';
import { createLogger, isLogLevel, levelFromVerbosity } from '../logger.js';
import { createSink } from './test-helpers.js';

describe('createLogger', () => {
  it('should write prefixed lines with JSON metadata', () => {
    const sink = createSink();
    const logger = createLogger({ level: 'info', stream: sink });

    logger.info('Build completed successfully', { duration: 12 });

    expect(sink.output).toBe('[OPSFLOW INFO] Build completed successfully {"duration":12}\n');
  });

  it('should default to warn', () => {
    const sink = createSink();
    const logger = createLogger({ stream: sink });

    logger.info('hidden');
    logger.debug('hidden');
    logger.warn('shown');

    expect(sink.output).toBe('[OPSFLOW WARN] shown\n');
  });

  it('should write everything at debug', () => {
    const sink = createSink();
    const logger = createLogger({ level: 'debug', stream: sink, prefix: 'TEST' });

    logger.debug('one');
    logger.error('two');

    expect(sink.output).toBe('[TEST DEBUG] one\n[TEST ERROR] two\n');
  });

  it('should print errors by name and message', () => {
    const sink = createSink();
    const logger = createLogger({ level: 'error', stream: sink });

    logger.error('Command failed', new TypeError('bad input'));

    expect(sink.output).toBe('[OPSFLOW ERROR] Command failed TypeError: bad input\n');
  });
});

describe('levelFromVerbosity', () => {
  it('should map -v counts to levels', () => {
    expect(levelFromVerbosity(0)).toBe('warn');
    expect(levelFromVerbosity(1)).toBe('info');
    expect(levelFromVerbosity(2)).toBe('debug');
    expect(levelFromVerbosity(5)).toBe('debug');
  });
});

describe('isLogLevel', () => {
  it('should accept only known levels', () => {
    expect(isLogLevel('debug')).toBe(true);
    expect(isLogLevel('trace')).toBe(false);
  });
});
