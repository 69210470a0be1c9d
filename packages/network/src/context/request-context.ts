import { performance } from 'node:perf_hooks';
import type { HttpClient } from '../client/http-client.js';
import type { ClientOverrides, Clock } from '../types.js';

export const DEFAULT_CONTEXT_TIMEOUT_MS = 120_000;

/** Slack granted on top of the timeout before the budget counts as spent. */
export const TIMEOUT_ALLOWANCE_MS = 200;

/** What a context needs from its network. */
type ClientProvider = {
  readonly name: string;
  acquireClient(overrides?: ClientOverrides): Promise<HttpClient>;
  shouldRetryOnStatus(status: number): boolean;
};

type RequestContextOptions = {
  provider: ClientProvider;
  retries: number;
  timeoutMs?: number;
  startTime?: number;
  clock?: Clock;
};

const defaultClock: Clock = () => performance.now();

/**
 * Time and retry budget of one logical call (one engine invocation, one
 * `call()` closure, or one slot of a multi-request).
 */
export class RequestContext {
  readonly provider: ClientProvider;
  readonly timeoutMs: number;
  readonly startTime: number;
  retries: number;
  activeClient: HttpClient | undefined;
  disconnectRetried: boolean;
  private readonly clock: Clock;
  private httpTime: number;

  constructor(options: RequestContextOptions) {
    this.provider = options.provider;
    this.clock = options.clock ?? defaultClock;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_CONTEXT_TIMEOUT_MS;
    this.startTime = options.startTime ?? this.clock();
    this.retries = options.retries;
    this.activeClient = undefined;
    this.disconnectRetried = false;
    this.httpTime = 0;
  }

  get httpTimeMs(): number {
    return this.httpTime;
  }

  get elapsedMs(): number {
    return this.clock() - this.startTime;
  }

  remainingTime(overrideTimeoutMs?: number): number {
    const timeout = overrideTimeoutMs ?? this.timeoutMs;
    return timeout + TIMEOUT_ALLOWANCE_MS - this.elapsedMs;
  }

  /** Time spent in `operation` counts as HTTP time, whether it succeeds or not. */
  async recordHttpTime<T>(operation: () => Promise<T>): Promise<T> {
    const start = this.clock();
    try {
      return await operation();
    } finally {
      this.httpTime += this.clock() - start;
    }
  }
}

export type { ClientProvider, RequestContextOptions };
