import { afterEach, describe, expect, it, vi } from 'vitest';
import { BenchmarkError, Logger, createSilentLogger, wrapError } from '../src/index.js';

describe('Logger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  function captureStderr() {
    return vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
  }

  it('writes JSON records at or above its level', () => {
    const write = captureStderr();
    const logger = new Logger({ level: 'info', format: 'json' });

    logger.debug('hidden');
    logger.info('hello', { n: 1 });

    expect(write).toHaveBeenCalledTimes(1);
    const line = String(write.mock.calls[0]?.[0]);
    expect(JSON.parse(line)).toEqual({
      ts: expect.any(String),
      level: 'info',
      msg: 'hello',
      n: 1,
    });
  });

  it('writes text records with extra fields', () => {
    const write = captureStderr();
    new Logger({ level: 'warn' }).warn('careful', { field: 'Gene', n: 2 });

    expect(String(write.mock.calls[0]?.[0])).toMatch(/^\[.+\] WARN careful field=Gene n=2\n$/);
  });

  it('merges child fields into every record', () => {
    const write = captureStderr();
    new Logger({ format: 'json' }).child({ schema: 'drug' }).error('boom', { field: 'Gene' });

    expect(JSON.parse(String(write.mock.calls[0]?.[0]))).toMatchObject({
      level: 'error',
      msg: 'boom',
      schema: 'drug',
      field: 'Gene',
    });
  });

  it('stays quiet when silent', () => {
    const write = captureStderr();
    const logger = createSilentLogger();
    logger.error('nothing');

    expect(write).not.toHaveBeenCalled();
    expect(logger.isLevelEnabled('error')).toBe(false);
  });
});

describe('BenchmarkError', () => {
  it('formats an actionable message', () => {
    const err = new BenchmarkError({
      code: 'UNKNOWN_SCHEMA',
      message: 'Unknown schema: x',
      suggestion: 'Use one of: drug',
    });

    expect(err.toActionableMessage()).toBe(
      'Error [UNKNOWN_SCHEMA]: Unknown schema: x\nSuggested action: Use one of: drug'
    );
    expect(err.toJSON()).toEqual({
      name: 'BenchmarkError',
      code: 'UNKNOWN_SCHEMA',
      message: 'Unknown schema: x',
      suggestion: 'Use one of: drug',
      context: undefined,
    });
  });

  it('wraps unknown errors', () => {
    const original = new BenchmarkError({ code: 'INVALID_INPUT', message: 'bad' });
    expect(wrapError(original)).toBe(original);

    const cause = new Error('disk full');
    const wrapped = wrapError(cause, 'CONFIGURATION_ERROR');
    expect(wrapped.code).toBe('CONFIGURATION_ERROR');
    expect(wrapped.message).toBe('disk full');
    expect(wrapped.cause).toBe(cause);

    expect(wrapError('plain').code).toBe('EVALUATION_FAILED');
  });
});
