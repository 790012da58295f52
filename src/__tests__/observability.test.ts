/**
 * Tests for logging, metrics and tracing.
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import {
  ConsoleLogger,
  InMemoryLogger,
  InMemoryMetricsCollector,
  InMemoryTracer,
  LogLevel,
  redactContext,
} from '../index.js';

describe('ConsoleLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should write one JSON line with redacted secrets', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const logger = new ConsoleLogger({ context: { service: 'batch' } });

    logger.info('Connecting', { host: 'db.local', password: 'test-secret', nested: { token: 'test-token' } });

    expect(log).toHaveBeenCalledTimes(1);
    const line = JSON.parse(String(log.mock.calls[0]?.[0]));
    expect(line.level).toBe('INFO');
    expect(line.message).toBe('Connecting');
    expect(line.context).toEqual({
      service: 'batch',
      host: 'db.local',
      password: '[REDACTED]',
      nested: { token: '[REDACTED]' },
    });
  });

  it('should drop entries below its level', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const logger = new ConsoleLogger({ level: LogLevel.WARN });

    logger.info('hidden');
    logger.warn('shown');

    expect(log).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it('should send errors to stderr', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    new ConsoleLogger().child({ procedure: 'fato.x' }).error('Period failed', { period: 2 });

    const line = JSON.parse(String(error.mock.calls[0]?.[0]));
    expect(line.context).toEqual({ procedure: 'fato.x', period: 2 });
  });
});

describe('InMemoryLogger', () => {
  it('should share entries with child loggers', () => {
    const logger = new InMemoryLogger();

    logger.child({ procedure: 'fato.x' }).warn('retrying');
    logger.info('done');

    expect(logger.getEntries().map(entry => [entry.level, entry.message, entry.context])).toEqual([
      [LogLevel.WARN, 'retrying', { procedure: 'fato.x' }],
      [LogLevel.INFO, 'done', {}],
    ]);
    expect(logger.getEntriesAtLevel(LogLevel.WARN)).toHaveLength(1);
  });
});

describe('InMemoryMetricsCollector', () => {
  it('should key counters by name and tags regardless of tag order', () => {
    const metrics = new InMemoryMetricsCollector();

    metrics.increment('queries', 1, { mode: 'routine', attempt: 'bound' });
    metrics.increment('queries', 2, { attempt: 'bound', mode: 'routine' });
    metrics.increment('queries');

    expect(metrics.getCounter('queries', { mode: 'routine', attempt: 'bound' })).toBe(3);
    expect(metrics.getCounter('queries')).toBe(1);
  });

  it('should keep timing observations per series', () => {
    const metrics = new InMemoryMetricsCollector();

    metrics.timing('duration', 0.5, { mode: 'range' });
    metrics.timing('duration', 1.25, { mode: 'range' });
    metrics.timing('duration', 2, { mode: 'routine' });

    expect(metrics.getTimings('duration', { mode: 'range' })).toEqual([0.5, 1.25]);
    expect(metrics.getTimings('duration')).toEqual([]);
  });
});

describe('redactContext', () => {
  it('should mask sensitive keys regardless of case and leave arrays alone', () => {
    const context = { Password: 'test-secret', connectionString: 'x', user: 'reader', list: [{ token: 't' }] };

    expect(redactContext(context)).toEqual({
      Password: '[REDACTED]',
      connectionString: '[REDACTED]',
      user: 'reader',
      list: [{ token: 't' }],
    });
  });
});

describe('InMemoryTracer', () => {
  it('should mark successful spans OK', async () => {
    const tracer = new InMemoryTracer();

    const value = await tracer.withSpan('work', () => 42, { procedure: 'fato.x' });

    expect(value).toBe(42);
    const span = tracer.getSpansByName('work')[0];
    expect(span?.status).toBe('OK');
    expect(span?.attributes).toEqual({ procedure: 'fato.x' });
    expect(span?.endTime).toBeInstanceOf(Date);
  });

  it('should record the exception of failed spans', async () => {
    const tracer = new InMemoryTracer();

    await expect(
      tracer.withSpan('work', () => {
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');
    expect(tracer.getSpans()[0]?.status).toBe('ERROR');
    expect(tracer.getSpans()[0]?.statusMessage).toBe('boom');
  });
});
