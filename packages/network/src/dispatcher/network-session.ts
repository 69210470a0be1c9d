import { NetworkError, RequestTimeoutError } from '../errors.js';
import { raiseForHttpError, raiseForStreamHttpError } from '../http-errors/raise-for-http-error.js';
import { sendExchange, streamExchange, type CallTools, type RetryStrategy } from '../retry/retry-strategy.js';
import { HttpVerbs, prepareRequest } from './http-verbs.js';
import type { NetworkResponse, StreamResponse } from '../client/response.js';
import type { RequestContext } from '../context/request-context.js';
import type { Network } from '../network/network.js';
import type { NetworkMetrics, RequestOutcome } from '../observability/metrics.js';
import type { HttpMethod, RequestDescriptor, RequestOptions } from '../types.js';

type SessionOptions = {
  /** Budget of each call made through the session; 120 s when omitted. */
  timeoutMs?: number;
  /** Start of the budget, on the network clock. Defaults to the start of each call. */
  startTime?: number;
};

type CallBody<T> = (http: ScopedHttp, tools: CallTools<T>) => Promise<T>;

function toError(reason: unknown): Error {
  return reason instanceof Error ? reason : new NetworkError(String(reason), { cause: reason });
}

/**
 * Requests issued from inside `NetworkSession.call()`: they share the call's
 * context, so they draw on one time and retry budget.
 */
export class ScopedHttp extends HttpVerbs {
  private readonly context: RequestContext;
  private readonly strategy: RetryStrategy;

  constructor(context: RequestContext, strategy: RetryStrategy) {
    super();
    this.context = context;
    this.strategy = strategy;
  }

  async request(method: HttpMethod, url: string, options: RequestOptions = {}): Promise<NetworkResponse> {
    const response = await this.strategy.send(this.context, prepareRequest(method, url, options), sendExchange);
    if (options.raiseForHttpError) {
      raiseForHttpError(response);
    }
    return response;
  }

  async stream(method: HttpMethod, url: string, options: RequestOptions = {}): Promise<StreamResponse> {
    const response = await this.strategy.send(this.context, prepareRequest(method, url, options), streamExchange);
    if (options.raiseForHttpError) {
      await raiseForStreamHttpError(response);
    }
    return response;
  }
}

/**
 * Entry point of one engine invocation on one network. Every top-level
 * request, stream or call gets a fresh context; HTTP time adds up across them.
 */
export class NetworkSession extends HttpVerbs {
  readonly network: Network;
  private readonly sessionOptions: SessionOptions;
  private readonly metrics: NetworkMetrics | undefined;
  private totalHttpTime: number;

  constructor(network: Network, options: SessionOptions = {}, metrics?: NetworkMetrics) {
    super();
    this.network = network;
    this.sessionOptions = options;
    this.metrics = metrics;
    this.totalHttpTime = 0;
  }

  /** HTTP time of every call made through this session so far. */
  get httpTimeMs(): number {
    return this.totalHttpTime;
  }

  async request(method: HttpMethod, url: string, options: RequestOptions = {}): Promise<NetworkResponse> {
    const prepared = prepareRequest(method, url, options);
    const response = await this.run(this.createContext(), (context) =>
      this.network.strategy.request(context, prepared, sendExchange),
    );

    if (options.raiseForHttpError) {
      raiseForHttpError(response);
    }
    return response;
  }

  async stream(method: HttpMethod, url: string, options: RequestOptions = {}): Promise<StreamResponse> {
    const prepared = prepareRequest(method, url, options);
    const response = await this.run(this.createContext(), (context) =>
      this.network.strategy.request(context, prepared, streamExchange),
    );

    if (options.raiseForHttpError) {
      await raiseForStreamHttpError(response);
    }
    return response;
  }

  /**
   * Runs `fn` under the network's retry strategy. With the `engine` strategy
   * the whole function is rerun on retry; `tools.softRetry(fallback)` asks
   * for a rerun and supplies the value to return once retries run out.
   */
  call<T>(fn: CallBody<T>): Promise<T> {
    const strategy = this.network.strategy;
    return this.run(this.createContext(), (context) =>
      strategy.call(context, (tools) => fn(new ScopedHttp(context, strategy), tools)),
    );
  }

  /**
   * Sends every request concurrently, each with its own retry budget but a
   * common start time. A failed slot holds its error.
   */
  async multiRequest(descriptors: readonly RequestDescriptor[]): Promise<Array<NetworkResponse | Error>> {
    const startTime = this.createContext().startTime;

    const settled = await Promise.allSettled(
      descriptors.map((descriptor) => {
        const options = descriptor.options ?? {};
        const prepared = prepareRequest(descriptor.method, descriptor.url, options);
        return this.run(this.createContext(startTime), async (context) => {
          const response = await this.network.strategy.request(context, prepared, sendExchange);
          if (options.raiseForHttpError) {
            raiseForHttpError(response);
          }
          return response;
        });
      }),
    );

    return settled.map((result) => (result.status === 'fulfilled' ? result.value : toError(result.reason)));
  }

  private createContext(startTime = this.sessionOptions.startTime): RequestContext {
    return this.network.createContext({ timeoutMs: this.sessionOptions.timeoutMs, startTime });
  }

  private async run<T>(context: RequestContext, operation: (context: RequestContext) => Promise<T>): Promise<T> {
    let outcome: RequestOutcome = 'error';
    try {
      const value = await operation(context);
      outcome = 'success';
      return value;
    } catch (error) {
      if (error instanceof RequestTimeoutError) {
        outcome = 'timeout';
      }
      throw error;
    } finally {
      context.activeClient = undefined;
      this.totalHttpTime += context.httpTimeMs;
      this.metrics?.recordRequest(this.network.name, outcome, context.httpTimeMs);
    }
  }
}

export type { SessionOptions, CallBody };
