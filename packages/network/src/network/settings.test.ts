import { describe, it, expect } from 'vitest';
import { decodeNetworkSettings, decodeProxies } from './settings.js';
import { ConfigurationError } from '../errors.js';

describe('decodeNetworkSettings', () => {
  it('applies defaults to an empty network', () => {
    const settings = decodeNetworkSettings('default', {});

    expect(settings).toEqual({
      name: 'default',
      enableHttp: false,
      enableHttp2: true,
      verify: true,
      maxRedirects: 30,
      sourceAddresses: [],
      proxies: {},
      maxConnections: 10,
      maxKeepaliveConnections: 100,
      keepaliveExpiryMs: 5000,
      retries: 0,
      retryOnHttpError: undefined,
      retryStrategy: 'different_http_client',
      usingTorProxy: false,
    });
    expect(Object.isFrozen(settings)).toBe(true);
  });

  it('converts seconds and accepts the alternative key names', () => {
    const settings = decodeNetworkSettings('bing', {
      local_addresses: '192.168.0.0/30',
      max_connections: 4,
      max_keepalive_connections: 2,
      keepalive_expiry: 1.5,
      retry_strategy: 'ENGINE',
      retry_on_http_error: [403, 429],
    });

    expect(settings.sourceAddresses).toEqual(['192.168.0.0/30']);
    expect(settings.maxConnections).toBe(4);
    expect(settings.maxKeepaliveConnections).toBe(2);
    expect(settings.keepaliveExpiryMs).toBe(1500);
    expect(settings.retryStrategy).toBe('engine');
    expect(settings.retryOnHttpError).toEqual([403, 429]);
  });

  it('treats null limits as unlimited', () => {
    const settings = decodeNetworkSettings('unbounded', {
      pool_connections: null,
      pool_maxsize: null,
      keepalive_expiry: null,
    });

    expect(settings.maxConnections).toBe(Infinity);
    expect(settings.maxKeepaliveConnections).toBe(Infinity);
    expect(settings.keepaliveExpiryMs).toBeUndefined();
  });

  it('rejects retry_on_http_error values of the wrong shape', () => {
    expect(() => decodeNetworkSettings('bad', { retry_on_http_error: 'always' })).toThrow(ConfigurationError);
    expect(() => decodeNetworkSettings('bad', { retry_on_http_error: { status: 403 } })).toThrow(
      'Network "bad": retry_on_http_error: expected a boolean, a status code or a list of status codes',
    );
  });

  it('rejects unknown retry strategies and negative retries', () => {
    expect(() => decodeNetworkSettings('bad', { retry_strategy: 'random' })).toThrow(ConfigurationError);
    expect(() => decodeNetworkSettings('bad', { retries: -1 })).toThrow(ConfigurationError);
  });
});

describe('decodeProxies', () => {
  it('applies a single proxy or a list to every URL', () => {
    expect(decodeProxies('tor', 'socks5h://127.0.0.1:9050')).toEqual({ 'all://': ['socks5h://127.0.0.1:9050'] });
    expect(decodeProxies('pool', ['http://p1:3128', 'http://p2:3128'])).toEqual({
      'all://': ['http://p1:3128', 'http://p2:3128'],
    });
  });

  it('normalizes pattern keys', () => {
    expect(
      decodeProxies('mixed', {
        https: ['http://p1:3128', 'http://p2:3128'],
        'http:': 'http://p3:3128',
        'https://bing.com': 'socks5://p4:1080',
      }),
    ).toEqual({
      'https://': ['http://p1:3128', 'http://p2:3128'],
      'http://': ['http://p3:3128'],
      'https://bing.com': ['socks5://p4:1080'],
    });
  });

  it('rejects unsupported proxy schemes', () => {
    expect(() => decodeProxies('bad', 'ftp://proxy:21')).toThrow(
      'Network "bad": unsupported proxy scheme "ftp" (expected http, https, socks4, socks5, socks5h)',
    );
    expect(() => decodeProxies('bad', 'not a url')).toThrow(ConfigurationError);
  });
});
