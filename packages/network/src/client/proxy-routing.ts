import type { ProxySelection } from '../types.js';

type ParsedPattern = {
  scheme: string;
  host: string;
};

export const PROXY_SCHEMES = ['http', 'https', 'socks4', 'socks5', 'socks5h'] as const;

function parsePattern(pattern: string): ParsedPattern | undefined {
  const match = /^([a-z0-9]+):\/\/(.*)$/i.exec(pattern);
  if (!match) {
    return undefined;
  }

  return { scheme: (match[1] ?? '').toLowerCase(), host: (match[2] ?? '').toLowerCase() };
}

function hostMatches(patternHost: string, target: URL): boolean {
  if (patternHost === '') {
    return true;
  }

  const host = target.host.toLowerCase();
  const hostname = target.hostname.toLowerCase();

  // `*.example.com` matches subdomains, `*example.com` the domain too
  if (patternHost.startsWith('*')) {
    return hostname.endsWith(patternHost.slice(1));
  }

  return patternHost === host || patternHost === hostname;
}

/**
 * Picks the proxy for a target URL. A pattern naming a host wins over one
 * naming a scheme, which wins over `all://`.
 */
export function selectProxy(proxies: ProxySelection | undefined, target: URL): string | undefined {
  if (!proxies) {
    return undefined;
  }

  const targetScheme = target.protocol.replace(/:$/, '').toLowerCase();
  let best: { url: string; rank: number } | undefined;

  for (const [pattern, url] of Object.entries(proxies)) {
    const parsed = parsePattern(pattern);
    if (!parsed) {
      continue;
    }

    if (parsed.scheme !== 'all' && parsed.scheme !== targetScheme) {
      continue;
    }

    if (!hostMatches(parsed.host, target)) {
      continue;
    }

    const rank = (parsed.host === '' ? 0 : 2) + (parsed.scheme === 'all' ? 0 : 1);
    if (!best || rank > best.rank) {
      best = { url, rank };
    }
  }

  return best?.url;
}

/** `http` and `http:` become `http://`; an `all` key becomes `all://`. */
export function normalizeProxyPattern(pattern: string): string {
  const trimmed = pattern.trim();
  if (trimmed.includes('://')) {
    return trimmed;
  }

  return `${trimmed.replace(/:$/, '')}://`;
}

export function isSocksProxy(proxyUrl: string): boolean {
  return /^socks/i.test(proxyUrl);
}
