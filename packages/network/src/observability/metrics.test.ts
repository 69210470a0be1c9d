import { describe, it, expect } from 'vitest';
import type { Logger } from '@workspace/logger';
import { NetworkMetrics } from './metrics.js';

describe('NetworkMetrics', () => {
  it('counts requests per network and outcome', () => {
    const metrics = new NetworkMetrics();

    metrics.recordRequest('google', 'success', 120);
    metrics.recordRequest('google', 'error', 80);
    metrics.recordRequest('bing', 'timeout', 3000);

    expect(metrics.snapshot().counters).toEqual({
      'google.requests.total': 2,
      'google.requests.success': 1,
      'google.requests.error': 1,
      'bing.requests.total': 1,
      'bing.requests.timeout': 1,
    });
  });

  it('summarizes HTTP time per network', () => {
    const metrics = new NetworkMetrics();

    metrics.recordHttpTime('google', 100);
    metrics.recordHttpTime('google', 300);

    expect(metrics.snapshot().httpTime).toEqual({
      google: { count: 2, min: 100, max: 300, avg: 200, total: 400 },
    });
  });

  it('increments custom counters by an amount', () => {
    const metrics = new NetworkMetrics();

    metrics.increment('google.retries', 2);
    metrics.increment('google.retries');

    expect(metrics.snapshot().counters['google.retries']).toBe(3);
  });

  it('reset clears everything', () => {
    const metrics = new NetworkMetrics();
    metrics.recordRequest('google', 'success', 10);

    metrics.reset();

    expect(metrics.snapshot()).toEqual({ counters: {}, httpTime: {} });
  });

  it('logs a snapshot', () => {
    const metrics = new NetworkMetrics();
    metrics.increment('google.requests.total');
    const lines: Array<{ message: string; data: unknown }> = [];
    const logger: Logger = {
      fatal: () => {},
      error: () => {},
      warn: () => {},
      info: (message, data) => {
        lines.push({ message, data });
      },
      debug: () => {},
      trace: () => {},
      child: () => logger,
      isLevelEnabled: () => true,
    };

    metrics.log(logger);

    expect(lines).toEqual([
      { message: 'Network metrics', data: { counters: { 'google.requests.total': 1 }, httpTime: {} } },
    ]);
  });
});
