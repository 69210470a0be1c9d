import { createLogger, type Logger } from '@workspace/logger';
import { ConfigurationError } from '../errors.js';
import type { Settings } from '../config/settings.js';
import { Network, type NetworkDependencies } from './network.js';
import { NETWORK_SETTING_KEYS, canonicalNetworkKeys, decodeNetworkSettings } from './settings.js';

export const DEFAULT_NETWORK_NAME = '__default__';

type RegistryDependencies = Omit<NetworkDependencies, 'logger'>;

type NetworkSummary = {
  name: string;
  aliases: string[];
  sourceAddresses: readonly string[];
  proxyPatterns: string[];
  retries: number;
  retryStrategy: string;
  usingTorProxy: boolean;
};

function pickNetworkKeys(source: Record<string, unknown>): Record<string, unknown> {
  return canonicalNetworkKeys(
    Object.fromEntries(NETWORK_SETTING_KEYS.filter((key) => source[key] !== undefined).map((key) => [key, source[key]])),
  );
}

/**
 * Name to network table. Built once from settings and never changed
 * afterwards; engines that reference another network share its instance.
 */
export class NetworkRegistry {
  readonly requestTimeoutMs: number;
  readonly maxRequestTimeoutMs: number | undefined;
  private readonly networks: ReadonlyMap<string, Network>;
  private readonly engineTimeouts: ReadonlyMap<string, number>;
  private readonly logger: Logger;
  private readonly reportedFallbacks: Set<string>;
  private shutdownPromise: Promise<void> | undefined;

  private constructor(
    networks: ReadonlyMap<string, Network>,
    engineTimeouts: ReadonlyMap<string, number>,
    requestTimeoutMs: number,
    maxRequestTimeoutMs: number | undefined,
  ) {
    this.networks = networks;
    this.engineTimeouts = engineTimeouts;
    this.requestTimeoutMs = requestTimeoutMs;
    this.maxRequestTimeoutMs = maxRequestTimeoutMs;
    this.logger = createLogger('network-registry');
    this.reportedFallbacks = new Set();
    this.shutdownPromise = undefined;
  }

  /**
   * Order: the default network, `ipv4` and `ipv6`, `outgoing.networks`, one
   * entry per engine, then `image_proxy` and `autocomplete` unless defined.
   * An engine either defines its own network under `network`, lists network
   * keys inline, or names another network. Names are resolved once every
   * engine has its own network, so an engine may point at one listed after it.
   */
  static fromSettings(settings: Settings, dependencies: RegistryDependencies = {}): NetworkRegistry {
    const defaults = pickNetworkKeys(settings.outgoing);
    const networks = new Map<string, Network>();
    const build = (name: string, raw: Record<string, unknown>): Network =>
      new Network(decodeNetworkSettings(name, { ...defaults, ...canonicalNetworkKeys(raw) }), dependencies);

    networks.set(DEFAULT_NETWORK_NAME, build(DEFAULT_NETWORK_NAME, {}));
    networks.set('ipv4', build('ipv4', { source_ips: ['0.0.0.0'] }));
    networks.set('ipv6', build('ipv6', { source_ips: ['::'] }));

    for (const [name, raw] of Object.entries(settings.outgoing.networks)) {
      networks.set(name, build(name, raw));
    }

    const engineTimeouts = new Map<string, number>();
    for (const engine of settings.engines) {
      if (engine.timeout !== undefined) {
        engineTimeouts.set(engine.name, Math.round(engine.timeout * 1000));
      }

      if (typeof engine.network !== 'string') {
        networks.set(engine.name, build(engine.name, engine.network ?? pickNetworkKeys(engine)));
      }
    }

    for (const engine of settings.engines) {
      if (typeof engine.network !== 'string') {
        continue;
      }
      const target = networks.get(engine.network);
      if (!target) {
        throw new ConfigurationError(`Engine "${engine.name}" uses unknown network "${engine.network}"`);
      }
      networks.set(engine.name, target);
    }

    if (!networks.has('image_proxy')) {
      networks.set('image_proxy', build('image_proxy', { enable_http2: false }));
    }
    if (!networks.has('autocomplete')) {
      networks.set('autocomplete', build('autocomplete', {}));
    }

    const maxRequestTimeout = settings.outgoing.max_request_timeout;
    return new NetworkRegistry(
      networks,
      engineTimeouts,
      Math.round(settings.outgoing.request_timeout * 1000),
      maxRequestTimeout === null || maxRequestTimeout === undefined ? undefined : Math.round(maxRequestTimeout * 1000),
    );
  }

  get defaultNetwork(): Network {
    const network = this.networks.get(DEFAULT_NETWORK_NAME);
    if (!network) {
      throw new ConfigurationError('The default network is missing');
    }
    return network;
  }

  names(): string[] {
    return [...this.networks.keys()];
  }

  /** Unknown or missing names resolve to the default network. */
  get(name?: string): Network {
    if (name === undefined) {
      return this.defaultNetwork;
    }

    const network = this.networks.get(name);
    if (network) {
      return network;
    }

    if (!this.reportedFallbacks.has(name)) {
      this.reportedFallbacks.add(name);
      this.logger.debug(`No network named "${name}", using the default network`);
    }
    return this.defaultNetwork;
  }

  engineTimeoutMs(engine: string): number {
    return this.engineTimeouts.get(engine) ?? this.requestTimeoutMs;
  }

  summarize(): NetworkSummary[] {
    return this.distinctNetworks().map((network) => ({
      name: network.name,
      aliases: [...this.networks.entries()]
        .filter(([alias, target]) => target === network && alias !== network.name)
        .map(([alias]) => alias),
      sourceAddresses: network.settings.sourceAddresses,
      proxyPatterns: Object.keys(network.settings.proxies),
      retries: network.settings.retries,
      retryStrategy: network.settings.retryStrategy,
      usingTorProxy: network.settings.usingTorProxy,
    }));
  }

  /** Builds a client on every network; all failures are reported together. */
  async verify(): Promise<void> {
    const failures: string[] = [];

    await Promise.all(
      this.distinctNetworks().map(async (network) => {
        try {
          await network.checkConfiguration();
        } catch (error) {
          this.logger.error(`Network "${network.name}" failed its check`, error);
          failures.push(`${network.name}: ${error instanceof Error ? error.message : String(error)}`);
        }
      }),
    );

    if (failures.length > 0) {
      throw new ConfigurationError(`Network check failed (${failures.sort().join('; ')})`);
    }
  }

  shutdown(): Promise<void> {
    this.shutdownPromise ??= this.closeNetworks();
    return this.shutdownPromise;
  }

  private async closeNetworks(): Promise<void> {
    const networks = this.distinctNetworks();
    await Promise.all(networks.map((network) => network.close()));
    this.logger.debug(`Closed ${networks.length} networks`);
  }

  private distinctNetworks(): Network[] {
    return [...new Set(this.networks.values())];
  }
}

export type { RegistryDependencies, NetworkSummary };
