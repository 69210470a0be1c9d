import { Readable } from 'node:stream';
import { HttpClient, type HttpClientOptions, type SendOptions } from '../client/http-client.js';
import { NetworkResponse, StreamResponse, type ResponseHead } from '../client/response.js';
import type { PreparedRequest } from '../types.js';

type StubReply = {
  status: number;
  body?: string;
  headers?: Record<string, string>;
  /** Advances the manual clock, as if the exchange took that long. */
  durationMs?: number;
};

type StubFailure = {
  error: Error;
  durationMs?: number;
};

type StubStep = StubReply | StubFailure | Error | ((request: PreparedRequest) => StubReply | StubFailure | Error);

type RecordedCall = {
  clientId: string;
  request: PreparedRequest;
  timeoutMs: number;
};

export class ManualClock {
  private current: number;

  constructor(start = 0) {
    this.current = start;
  }

  readonly now = (): number => this.current;

  advance(ms: number): void {
    this.current += ms;
  }
}

export function stubClientOptions(overrides: Partial<HttpClientOptions> = {}): HttpClientOptions {
  return {
    verify: true,
    maxRedirects: 30,
    localAddress: undefined,
    proxies: undefined,
    enableHttp: false,
    enableHttp2: true,
    maxConnections: 10,
    maxKeepaliveConnections: 100,
    keepaliveExpiryMs: 5000,
    ...overrides,
  };
}

/**
 * Scripted transport shared by every client it creates. Steps are consumed
 * in order across clients; once the script is empty every send answers 200.
 */
export class StubTransport {
  readonly calls: RecordedCall[];
  readonly clients: StubHttpClient[];
  readonly streams: StreamResponse[];
  /** Statuses answered so far, in order. */
  readonly replied: number[];
  private readonly steps: StubStep[];
  private readonly clock: ManualClock | undefined;

  constructor(steps: StubStep[] = [], clock?: ManualClock) {
    this.steps = [...steps];
    this.clock = clock;
    this.calls = [];
    this.clients = [];
    this.streams = [];
    this.replied = [];
  }

  readonly factory = (options: HttpClientOptions): HttpClient => {
    const client = new StubHttpClient(options, this);
    this.clients.push(client);
    return client;
  };

  push(...steps: StubStep[]): void {
    this.steps.push(...steps);
  }

  reply(client: StubHttpClient, request: PreparedRequest, options: SendOptions): { head: ResponseHead; body: string } {
    this.calls.push({ clientId: client.id, request, timeoutMs: options.timeoutMs });

    const step = this.steps.shift() ?? { status: 200 };
    const outcome = typeof step === 'function' ? step(request) : step;
    if (outcome instanceof Error) {
      throw outcome;
    }

    if (outcome.durationMs !== undefined) {
      this.clock?.advance(outcome.durationMs);
    }

    if ('error' in outcome) {
      throw outcome.error;
    }

    this.replied.push(outcome.status);
    return {
      head: {
        status: outcome.status,
        statusText: '',
        headers: outcome.headers ?? {},
        setCookies: [],
        url: request.url,
        method: request.method,
        httpVersion: 'HTTP/1.1',
        clientId: client.id,
        elapsedMs: outcome.durationMs ?? 0,
      },
      body: outcome.body ?? '',
    };
  }
}

export class StubHttpClient extends HttpClient {
  closeCount: number;
  private readonly transport: StubTransport;

  constructor(options: HttpClientOptions, transport: StubTransport) {
    super(options);
    this.transport = transport;
    this.closeCount = 0;
  }

  get isClosed(): boolean {
    return this.closeCount > 0;
  }

  async close(): Promise<void> {
    this.closeCount += 1;
  }

  protected async performSend(request: PreparedRequest, options: SendOptions): Promise<NetworkResponse> {
    const { head, body } = this.transport.reply(this, request, options);
    return new NetworkResponse(head, Buffer.from(body));
  }

  protected async performStream(request: PreparedRequest, options: SendOptions): Promise<StreamResponse> {
    const { head, body } = this.transport.reply(this, request, options);
    const chunks = body.length > 0 ? body.split('|').map((part) => Buffer.from(part)) : [];
    const response = new StreamResponse(head, Readable.from(chunks));
    this.transport.streams.push(response);
    return response;
  }
}

export type { StubReply, StubFailure, StubStep, RecordedCall };
