import type { Logger } from '@workspace/logger';

type DurationSummary = {
  count: number;
  min: number;
  max: number;
  avg: number;
  total: number;
};

type NetworkMetricSnapshot = {
  counters: Record<string, number>;
  httpTime: Record<string, DurationSummary>;
};

type RequestOutcome = 'success' | 'error' | 'timeout';

function summarize(values: readonly number[]): DurationSummary {
  const count = values.length;
  const total = values.reduce((sum, value) => sum + value, 0);
  return {
    count,
    min: count > 0 ? Math.min(...values) : 0,
    max: count > 0 ? Math.max(...values) : 0,
    avg: count > 0 ? total / count : 0,
    total,
  };
}

/**
 * In-process counters and HTTP-time samples, keyed by network name.
 * Counter names look like `google.requests.success`.
 */
export class NetworkMetrics {
  private readonly counters: Map<string, number>;
  private readonly httpTimes: Map<string, number[]>;

  constructor() {
    this.counters = new Map();
    this.httpTimes = new Map();
  }

  increment(counter: string, amount = 1): void {
    const current = this.counters.get(counter) ?? 0;
    this.counters.set(counter, current + amount);
  }

  recordRequest(network: string, outcome: RequestOutcome, httpTimeMs: number): void {
    this.increment(`${network}.requests.total`);
    this.increment(`${network}.requests.${outcome}`);
    this.recordHttpTime(network, httpTimeMs);
  }

  recordHttpTime(network: string, ms: number): void {
    const values = this.httpTimes.get(network) ?? [];
    values.push(ms);
    this.httpTimes.set(network, values);
  }

  snapshot(): NetworkMetricSnapshot {
    const counters: Record<string, number> = {};
    for (const [key, value] of this.counters) {
      counters[key] = value;
    }

    const httpTime: Record<string, DurationSummary> = {};
    for (const [network, values] of this.httpTimes) {
      httpTime[network] = summarize(values);
    }

    return { counters, httpTime };
  }

  log(logger: Logger): void {
    logger.info('Network metrics', this.snapshot());
  }

  reset(): void {
    this.counters.clear();
    this.httpTimes.clear();
  }
}

export type { NetworkMetricSnapshot, DurationSummary, RequestOutcome };
