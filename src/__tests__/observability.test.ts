/**
 * Logger and metrics tests
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { ConsoleLogger, InMemoryMetricCollector, NoOpLogger, NoOpMetricCollector } from '../observability/index.js';

describe('ConsoleLogger', () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2026-01-02T03:04:05.000Z'));
  });

  afterEach(() => {
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  it('writes timestamp, prefix, level and context', () => {
    const info = vi.spyOn(console, 'info').mockImplementation(() => {});

    new ConsoleLogger().info('Operation finished', { pollCount: 2 });

    expect(info).toHaveBeenCalledWith('2026-01-02T03:04:05.000Z [operations] [INFO] Operation finished {"pollCount":2}');
  });

  it('omits an absent context', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});

    new ConsoleLogger({ prefix: '[jobs]' }).error('Request failed');

    expect(error).toHaveBeenCalledWith('2026-01-02T03:04:05.000Z [jobs] [ERROR] Request failed');
  });

  it('drops messages below the minimum level', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => {});
    const info = vi.spyOn(console, 'info').mockImplementation(() => {});
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});

    const logger = new ConsoleLogger({ minLevel: 'warn' });
    logger.debug('a');
    logger.info('b');
    logger.warn('c');

    expect(debug).not.toHaveBeenCalled();
    expect(info).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it('logs debug when asked', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => {});

    new ConsoleLogger({ minLevel: 'debug' }).debug('Polled operation');

    expect(debug).toHaveBeenCalledWith('2026-01-02T03:04:05.000Z [operations] [DEBUG] Polled operation');
  });
});

describe('InMemoryMetricCollector', () => {
  it('keys counters by name and sorted labels', () => {
    const metrics = new InMemoryMetricCollector();

    metrics.incrementCounter('requests', { outcome: 'success', operation: 'get' });
    metrics.incrementCounter('requests', { operation: 'get', outcome: 'success' }, 3);
    metrics.incrementCounter('requests');

    expect(metrics.getCounters()).toEqual(
      new Map([
        ['requests{operation=get,outcome=success}', 4],
        ['requests', 1],
      ])
    );
    expect(metrics.getCounter('requests', { operation: 'get', outcome: 'success' })).toBe(4);
    expect(metrics.getCounter('missing')).toBe(0);
  });

  it('skips undefined labels', () => {
    const metrics = new InMemoryMetricCollector();

    metrics.incrementCounter('requests', { operation: 'get', status: undefined });

    expect([...metrics.getCounters().keys()]).toEqual(['requests{operation=get}']);
  });

  it('collects histogram values and resets', () => {
    const metrics = new InMemoryMetricCollector();

    metrics.recordHistogram('wait', 100, { outcome: 'success' });
    metrics.recordHistogram('wait', 250, { outcome: 'success' });

    expect(metrics.getHistograms().get('wait{outcome=success}')).toEqual([100, 250]);

    metrics.reset();
    expect(metrics.getCounters().size).toBe(0);
    expect(metrics.getHistograms().size).toBe(0);
  });
});

describe('no-op implementations', () => {
  it('accept every call', () => {
    const logger = new NoOpLogger();
    const metrics = new NoOpMetricCollector();

    expect(() => {
      logger.error('ignored', { a: 1 });
      metrics.incrementCounter('x', { outcome: 'success' });
      metrics.recordHistogram('y', 1);
    }).not.toThrow();
  });
});
