import { HttpVerbs } from './http-verbs.js';
import { NetworkSession, type CallBody, type SessionOptions } from './network-session.js';
import type { NetworkResponse, StreamResponse } from '../client/response.js';
import type { NetworkRegistry } from '../network/registry.js';
import type { NetworkMetrics } from '../observability/metrics.js';
import type { HttpMethod, RequestDescriptor, RequestOptions } from '../types.js';

type DispatchOptions = RequestOptions & {
  /** Network or engine name; the default network when omitted or unknown. */
  network?: string;
};

type DispatchScope = SessionOptions & {
  network?: string;
};

type DispatcherOptions = {
  metrics?: NetworkMetrics;
};

/**
 * Process-wide front door. Each call opens a short-lived session on the
 * named network; engines that issue several requests should hold a session
 * of their own instead.
 */
export class Dispatcher extends HttpVerbs<DispatchOptions> {
  readonly registry: NetworkRegistry;
  readonly metrics: NetworkMetrics | undefined;

  constructor(registry: NetworkRegistry, options: DispatcherOptions = {}) {
    super();
    this.registry = registry;
    this.metrics = options.metrics;
  }

  session(network?: string, options: SessionOptions = {}): NetworkSession {
    return new NetworkSession(this.registry.get(network), options, this.metrics);
  }

  /** Session on the engine's network, bounded by the engine's timeout. */
  forEngine(engine: string, startTime?: number): NetworkSession {
    return this.session(engine, { timeoutMs: this.registry.engineTimeoutMs(engine), startTime });
  }

  request(method: HttpMethod, url: string, options: DispatchOptions = {}): Promise<NetworkResponse> {
    const { network, ...requestOptions } = options;
    return this.session(network).request(method, url, requestOptions);
  }

  stream(method: HttpMethod, url: string, options: DispatchOptions = {}): Promise<StreamResponse> {
    const { network, ...requestOptions } = options;
    return this.session(network).stream(method, url, requestOptions);
  }

  multiRequest(descriptors: readonly RequestDescriptor[], scope: DispatchScope = {}): Promise<Array<NetworkResponse | Error>> {
    const { network, ...options } = scope;
    return this.session(network, options).multiRequest(descriptors);
  }

  call<T>(fn: CallBody<T>, scope: DispatchScope = {}): Promise<T> {
    const { network, ...options } = scope;
    return this.session(network, options).call(fn);
  }

  shutdown(): Promise<void> {
    return this.registry.shutdown();
  }
}

export type { DispatchOptions, DispatchScope, DispatcherOptions };
