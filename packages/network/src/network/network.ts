import { createLogger, type Logger } from '@workspace/logger';
import { createHttpClient } from '../client/create-http-client.js';
import { TorVerifier } from '../client/tor-verifier.js';
import type { HttpClient, HttpClientFactory } from '../client/http-client.js';
import { RequestContext, type ClientProvider } from '../context/request-context.js';
import { ConnectionPool, type PoolStats } from '../pool/connection-pool.js';
import { createRetryStrategy, type RetryStrategy } from '../retry/retry-strategy.js';
import { shouldRetryStatus } from '../retry/retry-on-http-error.js';
import { AddressRotator } from '../rotation/address-rotator.js';
import { ProxyRotator } from '../rotation/proxy-rotator.js';
import type { NetworkSettings } from './settings.js';
import type { ClientKey, ClientOverrides, Clock } from '../types.js';

type NetworkDependencies = {
  clientFactory?: HttpClientFactory;
  torVerifier?: TorVerifier;
  clock?: Clock;
  logger?: Logger;
};

type ContextOptions = {
  timeoutMs?: number;
  startTime?: number;
};

/**
 * Named egress configuration: source address and proxy rotation, a client
 * pool and the retry strategy applied to every call made through it.
 */
export class Network implements ClientProvider {
  readonly name: string;
  readonly settings: NetworkSettings;
  readonly strategy: RetryStrategy;
  private readonly addresses: AddressRotator;
  private readonly proxies: ProxyRotator;
  private readonly pool: ConnectionPool;
  private readonly clientFactory: HttpClientFactory;
  private readonly torVerifier: TorVerifier;
  private readonly clock: Clock | undefined;
  private readonly logger: Logger;

  constructor(settings: NetworkSettings, dependencies: NetworkDependencies = {}) {
    this.name = settings.name;
    this.settings = settings;
    this.logger = dependencies.logger ?? createLogger(`network:${settings.name}`);
    this.addresses = new AddressRotator(settings.sourceAddresses);
    this.proxies = new ProxyRotator(settings.proxies);
    this.pool = new ConnectionPool(this.logger);
    this.strategy = createRetryStrategy(settings.retryStrategy, this.logger);
    this.clientFactory = dependencies.clientFactory ?? ((options) => createHttpClient(options, this.logger));
    this.torVerifier = dependencies.torVerifier ?? new TorVerifier();
    this.clock = dependencies.clock;

    if (this.addresses.isEmpty && this.proxies.isEmpty) {
      this.logger.warn('No source address and no proxy configured, using the default route');
    }
  }

  createContext(options: ContextOptions = {}): RequestContext {
    return new RequestContext({
      provider: this,
      retries: this.settings.retries,
      timeoutMs: options.timeoutMs,
      startTime: options.startTime,
      clock: this.clock,
    });
  }

  /** Advances both rotations and returns the pooled client for the resulting identity. */
  async acquireClient(overrides: ClientOverrides = {}): Promise<HttpClient> {
    const key: ClientKey = {
      verify: overrides.verify ?? this.settings.verify,
      maxRedirects: overrides.maxRedirects ?? this.settings.maxRedirects,
      localAddress: this.addresses.nextAddress(),
      proxies: this.proxies.nextProxySet(),
    };

    return this.pool.getClient(key, (clientKey) => this.createClient(clientKey));
  }

  shouldRetryOnStatus(status: number): boolean {
    return shouldRetryStatus(this.settings.retryOnHttpError, status);
  }

  /** Builds one client; on a Tor network this also proves the proxies exit through Tor. */
  async checkConfiguration(): Promise<void> {
    await this.acquireClient();
  }

  getStats(): PoolStats {
    return this.pool.getStats();
  }

  async close(): Promise<void> {
    await this.pool.closeAll();
  }

  private async createClient(key: ClientKey): Promise<HttpClient> {
    const client = this.clientFactory({
      ...key,
      enableHttp: this.settings.enableHttp,
      enableHttp2: this.settings.enableHttp2,
      maxConnections: this.settings.maxConnections,
      maxKeepaliveConnections: this.settings.maxKeepaliveConnections,
      keepaliveExpiryMs: this.settings.keepaliveExpiryMs,
    });

    if (this.settings.usingTorProxy) {
      try {
        await this.torVerifier.verify(client);
      } catch (error) {
        await client.close();
        throw error;
      }
      this.logger.debug('Tor routing confirmed', { proxies: key.proxies });
    }

    return client;
  }
}

export type { NetworkDependencies, ContextOptions };
