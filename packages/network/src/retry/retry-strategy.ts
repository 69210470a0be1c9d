import type { Logger } from '@workspace/logger';
import {
  RemoteDisconnectedError,
  RequestTimeoutError,
  RetryStateError,
  SoftRetryError,
  TransportError,
} from '../errors.js';
import type { HttpClient, SendOptions } from '../client/http-client.js';
import type { NetworkResponse, ReleasableResponse, StreamResponse } from '../client/response.js';
import type { RequestContext } from '../context/request-context.js';
import type { ClientOverrides, PreparedRequest } from '../types.js';

type RetryStrategyKind = 'engine' | 'same_http_client' | 'different_http_client';

/** One attempt of a request on a bound client. */
type Exchange<R extends ReleasableResponse> = (
  client: HttpClient,
  request: PreparedRequest,
  options: SendOptions,
) => Promise<R>;

/** Abandons the current run of a `call()` closure; `fallback` is returned once the budget is spent. */
type SoftRetry<T> = (fallback: T) => never;

type CallTools<T> = {
  softRetry: SoftRetry<T>;
};

type CallFunction<T> = (tools: CallTools<T>) => Promise<T>;

type LoopSteps<R> = {
  attempt: () => Promise<R>;
  shouldRetry?: (value: R) => boolean;
  discard?: (value: R) => void;
  fallback?: () => { value: R } | undefined;
  onDisconnect: () => Promise<void>;
};

export const sendExchange: Exchange<NetworkResponse> = (client, request, options) => client.send(request, options);

export const streamExchange: Exchange<StreamResponse> = (client, request, options) =>
  client.stream(request, options);

function overridesOf(request: PreparedRequest | undefined): ClientOverrides {
  return { verify: request?.options.verify, maxRedirects: request?.options.maxRedirects };
}

function describeRequest(request: PreparedRequest): string {
  return `${request.method} ${request.url}`;
}

/**
 * Shared retry loop. Variants differ in when a client is bound and in what
 * is rerun: a single send, or a whole `call()` closure.
 *
 * `retries = N` allows N + 1 attempts. Every attempt's timeout is clamped to
 * what is left of the context budget, and the loop gives up with
 * `RequestTimeoutError` once nothing is left.
 */
export abstract class RetryStrategy {
  abstract readonly kind: RetryStrategyKind;
  protected readonly logger: Logger;

  constructor(logger: Logger) {
    this.logger = logger;
  }

  /** Entry point of a top-level request. */
  request<R extends ReleasableResponse>(
    context: RequestContext,
    request: PreparedRequest,
    exchange: Exchange<R>,
  ): Promise<R> {
    return this.send(context, request, exchange);
  }

  /** One request, as issued from inside a call. */
  abstract send<R extends ReleasableResponse>(
    context: RequestContext,
    request: PreparedRequest,
    exchange: Exchange<R>,
  ): Promise<R>;

  async call<T>(context: RequestContext, fn: CallFunction<T>): Promise<T> {
    let fallback: { value: T } | undefined;
    const tools: CallTools<T> = {
      softRetry: (value: T): never => {
        fallback = { value };
        throw new SoftRetryError('Soft retry requested');
      },
    };

    return this.runLoop<T>(context, {
      attempt: async () => {
        fallback = undefined;
        await this.beforeCallAttempt(context);
        return fn(tools);
      },
      fallback: () => fallback,
      onDisconnect: () => this.dropActiveClient(context),
    });
  }

  protected async beforeCallAttempt(_context: RequestContext): Promise<void> {}

  protected shouldRetryResponse(context: RequestContext, response: ReleasableResponse): boolean {
    return context.provider.shouldRetryOnStatus(response.status);
  }

  protected async acquireClient(context: RequestContext, request?: PreparedRequest): Promise<HttpClient> {
    const client = await context.provider.acquireClient(overridesOf(request));
    context.activeClient = client;
    return client;
  }

  /** Reuses the bound client when it can serve the request. */
  protected async bindClient(context: RequestContext, request: PreparedRequest): Promise<HttpClient> {
    const active = context.activeClient;
    if (active && !active.isClosed && active.satisfies(overridesOf(request))) {
      return active;
    }
    return this.acquireClient(context, request);
  }

  protected async dropActiveClient(context: RequestContext): Promise<void> {
    const client = context.activeClient;
    context.activeClient = undefined;
    await client?.close();
  }

  protected async attempt<R extends ReleasableResponse>(
    context: RequestContext,
    client: HttpClient,
    request: PreparedRequest,
    exchange: Exchange<R>,
  ): Promise<R> {
    const timeoutMs = context.remainingTime(request.options.timeoutMs);
    if (timeoutMs <= 0) {
      throw new RequestTimeoutError(
        `${context.provider.name}: request timeout of ${request.options.timeoutMs ?? context.timeoutMs}ms spent ` +
          `before sending ${describeRequest(request)}`,
        context.httpTimeMs,
      );
    }

    this.logger.trace(`Sending ${describeRequest(request)}`, { client: client.id, timeoutMs, retries: context.retries });
    return context.recordHttpTime(() => exchange(client, request, { timeoutMs }));
  }

  protected async runLoop<R>(context: RequestContext, steps: LoopSteps<R>): Promise<R> {
    for (;;) {
      if (context.remainingTime() <= 0) {
        throw new RequestTimeoutError(
          `${context.provider.name}: time budget of ${context.timeoutMs}ms spent ` +
            `(HTTP time ${Math.round(context.httpTimeMs)}ms)`,
          context.httpTimeMs,
        );
      }

      if (context.retries < 0) {
        throw new RetryStateError();
      }

      let value: R;
      try {
        value = await steps.attempt();
      } catch (error) {
        if (error instanceof RemoteDisconnectedError && !context.disconnectRetried) {
          context.disconnectRetried = true;
          this.logger.debug(`${context.provider.name}: ${error.message}, retrying on a new connection`);
          await steps.onDisconnect();
          continue;
        }

        if (error instanceof SoftRetryError) {
          if (context.retries <= 0) {
            const fallback = steps.fallback?.();
            if (fallback) {
              return fallback.value;
            }
            throw error;
          }
          this.spendRetry(context, error.message);
          continue;
        }

        if (error instanceof TransportError) {
          if (context.retries <= 0) {
            throw error;
          }
          this.spendRetry(context, error.message);
          continue;
        }

        throw error;
      }

      if (steps.shouldRetry?.(value) && context.retries > 0) {
        steps.discard?.(value);
        this.spendRetry(context, 'retryable HTTP status');
        continue;
      }

      return value;
    }
  }

  private spendRetry(context: RequestContext, reason: string): void {
    context.retries -= 1;
    this.logger.debug(`${context.provider.name}: retrying (${reason}), ${context.retries} retries left`);
  }
}

/**
 * `engine`: the whole `call()` closure is rerun with a fresh client. Sends
 * inside it make one attempt each; a retryable status aborts the run while
 * budget remains and is handed back to the closure on the last run.
 */
export class RetryWithinFunction extends RetryStrategy {
  readonly kind = 'engine';

  request<R extends ReleasableResponse>(
    context: RequestContext,
    request: PreparedRequest,
    exchange: Exchange<R>,
  ): Promise<R> {
    return this.call(context, () => this.send(context, request, exchange));
  }

  async send<R extends ReleasableResponse>(
    context: RequestContext,
    request: PreparedRequest,
    exchange: Exchange<R>,
  ): Promise<R> {
    const client = await this.bindClient(context, request);
    const response = await this.attempt(context, client, request, exchange);

    if (this.shouldRetryResponse(context, response) && context.retries > 0) {
      response.release();
      throw new SoftRetryError(`HTTP ${response.status} from ${describeRequest(request)}`);
    }

    return response;
  }

  protected async beforeCallAttempt(context: RequestContext): Promise<void> {
    await this.acquireClient(context);
  }
}

/** `same_http_client`: one client for the whole call; each send is retried on it. */
export class RetrySameClient extends RetryStrategy {
  readonly kind = 'same_http_client';

  send<R extends ReleasableResponse>(
    context: RequestContext,
    request: PreparedRequest,
    exchange: Exchange<R>,
  ): Promise<R> {
    return this.runLoop(context, {
      attempt: async () => this.attempt(context, await this.bindClient(context, request), request, exchange),
      shouldRetry: (response) => this.shouldRetryResponse(context, response),
      discard: (response) => response.release(),
      onDisconnect: () => this.dropActiveClient(context),
    });
  }
}

/** `different_http_client`: every attempt takes the next client of the network's rotation. */
export class RetryNewClient extends RetryStrategy {
  readonly kind = 'different_http_client';

  send<R extends ReleasableResponse>(
    context: RequestContext,
    request: PreparedRequest,
    exchange: Exchange<R>,
  ): Promise<R> {
    return this.runLoop(context, {
      attempt: async () => this.attempt(context, await this.acquireClient(context, request), request, exchange),
      shouldRetry: (response) => this.shouldRetryResponse(context, response),
      discard: (response) => response.release(),
      onDisconnect: () => this.dropActiveClient(context),
    });
  }
}

export function createRetryStrategy(kind: RetryStrategyKind, logger: Logger): RetryStrategy {
  switch (kind) {
    case 'engine':
      return new RetryWithinFunction(logger);
    case 'same_http_client':
      return new RetrySameClient(logger);
    case 'different_http_client':
      return new RetryNewClient(logger);
  }
}

export type { RetryStrategyKind, Exchange, SoftRetry, CallTools, CallFunction };
