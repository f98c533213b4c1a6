import { describe, expect, it } from 'vitest';
import {
  createErrorEnvelope,
  wrapError,
  describeThrown,
  createLogger,
  FailNowSignal,
  RetryAbandonedError,
} from '../runner/index.js';

// ---------------------------------------------------------------------------
// Error envelopes
// ---------------------------------------------------------------------------

describe('Error envelopes', () => {
  it('creates envelope with correct fields', () => {
    const env = createErrorEnvelope('INVALID_CONFIG', 'bad wait', { context: { field: 'wait' } });
    expect(env).toEqual({
      code: 'INVALID_CONFIG',
      message: 'bad wait',
      retryable: false,
      context: { field: 'wait' },
    });
  });

  it('marks thrown checks as retryable', () => {
    expect(createErrorEnvelope('CHECK_THREW', 'x').retryable).toBe(true);
    expect(createErrorEnvelope('ASYNC_CHECK', 'x').retryable).toBe(true);
  });

  it('marks abandonment as final', () => {
    expect(createErrorEnvelope('ABANDONED', 'x').retryable).toBe(false);
  });

  it('wraps Error values', () => {
    const env = wrapError(new Error('disk full'));
    expect(env.code).toBe('CHECK_THREW');
    expect(env.message).toBe('disk full');
    expect(env.cause).toBe('disk full');
  });

  it('wraps non-Error values', () => {
    expect(wrapError({ status: 503 }).message).toBe('{"status":503}');
    expect(wrapError(7).message).toBe('7');
  });

  it('describes values JSON cannot render', () => {
    expect(describeThrown(undefined)).toBe('undefined');
    expect(describeThrown(10n)).toBe('10');
  });
});

describe('Error classes', () => {
  it('names the abort signal', () => {
    const signal = new FailNowSignal();
    expect(signal.name).toBe('FailNowSignal');
    expect(signal).toBeInstanceOf(Error);
  });

  it('gives abandonment a fallback message', () => {
    const err = new RetryAbandonedError('');
    expect(err.message).toBe('retry abandoned');
    expect(err.name).toBe('RetryAbandonedError');
  });
});

// ---------------------------------------------------------------------------
// Structured Logger
// ---------------------------------------------------------------------------

describe('Structured Logger', () => {
  it('writes JSONL entries in json mode', () => {
    const lines: string[] = [];
    const logger = createLogger({ module: 'test', json: true, write: (line) => lines.push(line) });

    logger.info('action1', 'Hello');
    logger.warn('action2', 'Warning', { attempt: 2 });

    expect(lines).toHaveLength(2);
    const entry1 = JSON.parse(lines[0] ?? '{}');
    expect(entry1.level).toBe('info');
    expect(entry1.module).toBe('test');
    expect(entry1.action).toBe('action1');
    expect(entry1.message).toBe('Hello');
    expect(JSON.parse(lines[1] ?? '{}').data).toEqual({ attempt: 2 });
  });

  it('writes only errors outside json mode', () => {
    const lines: string[] = [];
    const logger = createLogger({ module: 'test', write: (line) => lines.push(line) });

    logger.info('a', 'quiet');
    logger.error('b', 'loud');

    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0] ?? '{}').action).toBe('b');
  });

  it('respects minLevel', () => {
    const logger = createLogger({ module: 'test', minLevel: 'warn', write: () => undefined });

    logger.debug('a', 'skip');
    logger.info('b', 'skip');
    logger.warn('c', 'keep');
    logger.fatal('d', 'keep');

    expect(logger.entries().map((e) => e.action)).toEqual(['c', 'd']);
  });
});
