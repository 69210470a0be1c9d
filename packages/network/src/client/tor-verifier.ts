import { z } from 'zod';
import { ConfigurationError } from '../errors.js';
import type { HttpClient } from './http-client.js';

const TOR_CHECK_URL = 'https://check.torproject.org/api/ip';
const TOR_CHECK_TIMEOUT_MS = 10_000;

const torCheckSchema = z.object({ IsTor: z.boolean() });

function selectionKey(client: HttpClient): string {
  return JSON.stringify(Object.entries(client.options.proxies ?? {}));
}

/**
 * Confirms that a proxy selection exits through Tor. The outcome is cached
 * per selection, and concurrent checks of the same selection share one request.
 */
export class TorVerifier {
  private readonly checks: Map<string, Promise<void>>;
  private readonly timeoutMs: number;

  constructor(timeoutMs = TOR_CHECK_TIMEOUT_MS) {
    this.checks = new Map();
    this.timeoutMs = timeoutMs;
  }

  verify(client: HttpClient): Promise<void> {
    const key = selectionKey(client);
    const existing = this.checks.get(key);
    if (existing) {
      return existing;
    }

    const check = this.requestCheck(client);
    this.checks.set(key, check);
    return check;
  }

  private async requestCheck(client: HttpClient): Promise<void> {
    const proxies = Object.values(client.options.proxies ?? {}).join(', ') || 'no proxy';

    let payload: unknown;
    try {
      const response = await client.send(
        { method: 'GET', url: TOR_CHECK_URL, options: { allowRedirects: true } },
        { timeoutMs: this.timeoutMs },
      );
      payload = response.json();
    } catch (error) {
      throw new ConfigurationError(`Tor check failed through ${proxies}`, { cause: error });
    }

    const result = torCheckSchema.safeParse(payload);
    if (!result.success || !result.data.IsTor) {
      throw new ConfigurationError(`Traffic through ${proxies} does not exit through Tor`);
    }
  }
}
