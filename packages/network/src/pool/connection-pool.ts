import type { Logger } from '@workspace/logger';
import { NetworkError } from '../errors.js';
import type { HttpClient } from '../client/http-client.js';
import type { ClientKey } from '../types.js';

type ClientCreator = (key: ClientKey) => Promise<HttpClient> | HttpClient;

type PoolStats = {
  clients: number;
  pending: number;
  closed: boolean;
};

export function serializeClientKey(key: ClientKey): string {
  return JSON.stringify([
    key.verify,
    key.maxRedirects,
    key.localAddress ?? null,
    key.proxies ? Object.entries(key.proxies) : null,
  ]);
}

/**
 * Clients of one network, keyed by egress identity. Creation is exclusive
 * per key: concurrent callers for the same key share one pending creation,
 * callers for other keys never wait on it.
 */
export class ConnectionPool {
  private readonly clients: Map<string, HttpClient>;
  private readonly pending: Map<string, Promise<HttpClient>>;
  private readonly logger: Logger;
  private closing: Promise<void> | undefined;

  constructor(logger: Logger) {
    this.clients = new Map();
    this.pending = new Map();
    this.logger = logger;
    this.closing = undefined;
  }

  get isClosed(): boolean {
    return this.closing !== undefined;
  }

  async getClient(key: ClientKey, create: ClientCreator): Promise<HttpClient> {
    if (this.closing) {
      throw new NetworkError('Connection pool is closed');
    }

    const id = serializeClientKey(key);
    const cached = this.clients.get(id);
    if (cached && !cached.isClosed) {
      return cached;
    }

    const inFlight = this.pending.get(id);
    if (inFlight) {
      return inFlight;
    }

    const creation = this.create(id, key, create);
    this.pending.set(id, creation);
    try {
      return await creation;
    } finally {
      this.pending.delete(id);
    }
  }

  getStats(): PoolStats {
    return { clients: this.clients.size, pending: this.pending.size, closed: this.isClosed };
  }

  closeAll(): Promise<void> {
    this.closing ??= this.closeClients();
    return this.closing;
  }

  private async create(id: string, key: ClientKey, create: ClientCreator): Promise<HttpClient> {
    const client = await create(key);

    if (this.closing) {
      await client.close();
      throw new NetworkError('Connection pool closed while a client was being created');
    }

    this.clients.set(id, client);
    this.logger.debug('HTTP client added to pool', {
      client: client.id,
      localAddress: key.localAddress,
      proxies: key.proxies,
    });
    return client;
  }

  private async closeClients(): Promise<void> {
    const clients = [...this.clients.values()].filter((client) => !client.isClosed);
    this.clients.clear();

    const results = await Promise.allSettled(clients.map((client) => client.close()));
    results.forEach((result, index) => {
      if (result.status === 'rejected') {
        this.logger.error(`Failed to close HTTP client ${clients[index]?.id ?? 'unknown'}`, result.reason);
      }
    });
  }
}

export type { ClientCreator, PoolStats };
