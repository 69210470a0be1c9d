import { z } from 'zod';
import { ConfigurationError } from '../errors.js';
import { PROXY_SCHEMES, normalizeProxyPattern } from '../client/proxy-routing.js';
import type { RetryOnHttpError } from '../retry/retry-on-http-error.js';
import type { RetryStrategyKind } from '../retry/retry-strategy.js';
import type { ProxyTable } from '../types.js';

const proxyListSchema = z.union([z.string(), z.array(z.string())]);

const retryStrategySchema = z.preprocess(
  (value) => (typeof value === 'string' ? value.toLowerCase() : value),
  z.enum(['engine', 'same_http_client', 'different_http_client']),
);

/**
 * Network settings as written in a settings file. Every key is optional;
 * the registry merges a network over the `outgoing` defaults before decoding.
 */
export const rawNetworkSettingsSchema = z.object({
  enable_http: z.boolean().optional(),
  enable_http2: z.boolean().optional(),
  verify: z.union([z.boolean(), z.string().min(1)]).optional(),
  max_redirects: z.number().int().nonnegative().optional(),
  source_ips: proxyListSchema.nullish(),
  local_addresses: proxyListSchema.nullish(),
  proxies: z.union([z.string(), z.array(z.string()), z.record(z.string(), proxyListSchema)]).nullish(),
  pool_connections: z.number().int().positive().nullish(),
  max_connections: z.number().int().positive().nullish(),
  pool_maxsize: z.number().int().nonnegative().nullish(),
  max_keepalive_connections: z.number().int().nonnegative().nullish(),
  keepalive_expiry: z.number().nonnegative().nullish(),
  retries: z.number().int().nonnegative().optional(),
  retry_on_http_error: z
    .union([z.boolean(), z.number().int(), z.array(z.number().int())], {
      errorMap: () => ({ message: 'expected a boolean, a status code or a list of status codes' }),
    })
    .nullish(),
  retry_strategy: retryStrategySchema.optional(),
  using_tor_proxy: z.boolean().optional(),
});

type RawNetworkSettings = z.input<typeof rawNetworkSettingsSchema>;

export const NETWORK_SETTING_KEYS: readonly string[] = Object.keys(rawNetworkSettingsSchema.shape);

const KEY_ALIASES: Readonly<Record<string, string>> = {
  local_addresses: 'source_ips',
  max_connections: 'pool_connections',
  max_keepalive_connections: 'pool_maxsize',
};

/**
 * Renames alias keys to their canonical names so that a network and the
 * `outgoing` defaults it is merged over agree on one spelling. The canonical
 * key wins when a dict holds both.
 */
export function canonicalNetworkKeys(source: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(source)) {
    if (value === undefined) {
      continue;
    }

    const canonical = KEY_ALIASES[key];
    if (canonical === undefined) {
      result[key] = value;
    } else if (source[canonical] === undefined) {
      result[canonical] = value;
    }
  }
  return result;
}

type NetworkSettings = {
  readonly name: string;
  readonly enableHttp: boolean;
  readonly enableHttp2: boolean;
  readonly verify: boolean | string;
  readonly maxRedirects: number;
  readonly sourceAddresses: readonly string[];
  readonly proxies: ProxyTable;
  readonly maxConnections: number;
  readonly maxKeepaliveConnections: number;
  readonly keepaliveExpiryMs: number | undefined;
  readonly retries: number;
  readonly retryOnHttpError: RetryOnHttpError;
  readonly retryStrategy: RetryStrategyKind;
  readonly usingTorProxy: boolean;
};

export const NETWORK_DEFAULTS = {
  enableHttp: false,
  enableHttp2: true,
  verify: true,
  maxRedirects: 30,
  maxConnections: 10,
  maxKeepaliveConnections: 100,
  keepaliveExpiryMs: 5000,
  retries: 0,
  retryStrategy: 'different_http_client',
  usingTorProxy: false,
} as const satisfies Partial<NetworkSettings>;

function toList(value: string | readonly string[] | null | undefined): string[] {
  if (value === null || value === undefined) {
    return [];
  }
  return typeof value === 'string' ? [value] : [...value];
}

function validateProxyUrl(network: string, url: string): string {
  let scheme: string;
  try {
    scheme = new URL(url).protocol.replace(/:$/, '');
  } catch (error) {
    throw new ConfigurationError(`Network "${network}": invalid proxy URL "${url}"`, { cause: error });
  }

  if (!PROXY_SCHEMES.some((allowed) => allowed === scheme)) {
    throw new ConfigurationError(
      `Network "${network}": unsupported proxy scheme "${scheme}" (expected ${PROXY_SCHEMES.join(', ')})`,
    );
  }
  return url;
}

/**
 * A string or a list applies to every URL (`all://`); a mapping keys proxies
 * by pattern, accepting `http`, `http:` and `http://` alike.
 */
export function decodeProxies(network: string, proxies: RawNetworkSettings['proxies']): ProxyTable {
  if (proxies === null || proxies === undefined) {
    return {};
  }

  const table: Record<string, string[]> = {};
  const entries: Array<[string, string | readonly string[]]> =
    typeof proxies === 'string' || Array.isArray(proxies) ? [['all://', proxies]] : Object.entries(proxies);

  for (const [pattern, urls] of entries) {
    const list = toList(urls).map((url) => validateProxyUrl(network, url));
    if (list.length > 0) {
      table[normalizeProxyPattern(pattern)] = list;
    }
  }
  return table;
}

function secondsToMs(seconds: number | null | undefined, fallbackMs: number): number | undefined {
  if (seconds === null) {
    return undefined;
  }
  return seconds === undefined ? fallbackMs : Math.round(seconds * 1000);
}

export function formatIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
}

export function decodeNetworkSettings(name: string, raw: unknown): NetworkSettings {
  const parsed = rawNetworkSettingsSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    throw new ConfigurationError(`Network "${name}": ${formatIssues(parsed.error)}`, { cause: parsed.error });
  }

  const data = parsed.data;
  const maxConnections = data.pool_connections !== undefined ? data.pool_connections : data.max_connections;
  const maxKeepalive = data.pool_maxsize !== undefined ? data.pool_maxsize : data.max_keepalive_connections;

  return Object.freeze({
    name,
    enableHttp: data.enable_http ?? NETWORK_DEFAULTS.enableHttp,
    enableHttp2: data.enable_http2 ?? NETWORK_DEFAULTS.enableHttp2,
    verify: data.verify ?? NETWORK_DEFAULTS.verify,
    maxRedirects: data.max_redirects ?? NETWORK_DEFAULTS.maxRedirects,
    sourceAddresses: Object.freeze(toList(data.source_ips ?? data.local_addresses)),
    proxies: Object.freeze(decodeProxies(name, data.proxies)),
    // null means no limit
    maxConnections: maxConnections === null ? Infinity : maxConnections ?? NETWORK_DEFAULTS.maxConnections,
    maxKeepaliveConnections:
      maxKeepalive === null ? Infinity : maxKeepalive ?? NETWORK_DEFAULTS.maxKeepaliveConnections,
    keepaliveExpiryMs: secondsToMs(data.keepalive_expiry, NETWORK_DEFAULTS.keepaliveExpiryMs),
    retries: data.retries ?? NETWORK_DEFAULTS.retries,
    retryOnHttpError: data.retry_on_http_error ?? undefined,
    retryStrategy: data.retry_strategy ?? NETWORK_DEFAULTS.retryStrategy,
    usingTorProxy: data.using_tor_proxy ?? NETWORK_DEFAULTS.usingTorProxy,
  });
}

export type { NetworkSettings, RawNetworkSettings };
