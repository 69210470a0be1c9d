import { randomUUID } from 'node:crypto';
import { NetworkError, ProtocolDisabledError } from '../errors.js';
import type { NetworkResponse, StreamResponse } from './response.js';
import type { ClientKey, ClientOverrides, PreparedRequest } from '../types.js';

type HttpClientOptions = ClientKey & {
  enableHttp: boolean;
  enableHttp2: boolean;
  maxConnections: number;
  maxKeepaliveConnections: number;
  /** `undefined` keeps idle connections open until the client closes. */
  keepaliveExpiryMs: number | undefined;
};

type SendOptions = {
  /** Total deadline for this attempt, already clamped to the remaining budget. */
  timeoutMs: number;
};

type HttpClientFactory = (options: HttpClientOptions) => HttpClient;

/**
 * One egress identity: TLS verification, redirect limit, source address and
 * proxy selection are fixed for the lifetime of the client.
 */
export abstract class HttpClient {
  readonly id: string;
  readonly options: HttpClientOptions;

  constructor(options: HttpClientOptions) {
    this.id = randomUUID();
    this.options = options;
  }

  abstract get isClosed(): boolean;

  async send(request: PreparedRequest, options: SendOptions): Promise<NetworkResponse> {
    this.assertUsable(request);
    return this.performSend(request, options);
  }

  async stream(request: PreparedRequest, options: SendOptions): Promise<StreamResponse> {
    this.assertUsable(request);
    return this.performStream(request, options);
  }

  /** Whether this client can serve a request carrying these overrides. */
  satisfies(overrides: ClientOverrides): boolean {
    return (
      (overrides.verify === undefined || overrides.verify === this.options.verify) &&
      (overrides.maxRedirects === undefined || overrides.maxRedirects === this.options.maxRedirects)
    );
  }

  abstract close(): Promise<void>;

  protected abstract performSend(request: PreparedRequest, options: SendOptions): Promise<NetworkResponse>;

  protected abstract performStream(request: PreparedRequest, options: SendOptions): Promise<StreamResponse>;

  private assertUsable(request: PreparedRequest): void {
    if (this.isClosed) {
      throw new NetworkError(`HTTP client ${this.id} is closed`);
    }

    if (!this.options.enableHttp && new URL(request.url).protocol === 'http:') {
      throw new ProtocolDisabledError(request.url);
    }
  }
}

export type { HttpClientOptions, SendOptions, HttpClientFactory };
