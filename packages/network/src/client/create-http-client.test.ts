import { afterEach, describe, it, expect } from 'vitest';
import { createLogger } from '@workspace/logger';
import { AxiosHttpClient } from './axios-http-client.js';
import { createHttpClient } from './create-http-client.js';
import { UndiciHttpClient } from './undici-http-client.js';
import { stubClientOptions } from '../testing/stub-http-client.js';
import type { HttpClient } from './http-client.js';

const logger = createLogger('test:client-factory');

describe('createHttpClient', () => {
  const created: HttpClient[] = [];

  function create(overrides: Parameters<typeof stubClientOptions>[0]): HttpClient {
    const client = createHttpClient(stubClientOptions(overrides), logger);
    created.push(client);
    return client;
  }

  afterEach(async () => {
    await Promise.all(created.splice(0).map((client) => client.close()));
  });

  it('offers HTTP/2 on direct connections', () => {
    expect(create({ enableHttp2: true })).toBeInstanceOf(UndiciHttpClient);
  });

  it('stays on HTTP/1.1 when HTTP/2 is disabled', () => {
    expect(create({ enableHttp2: false })).toBeInstanceOf(AxiosHttpClient);
  });

  it('stays on HTTP/1.1 behind a proxy', () => {
    expect(create({ enableHttp2: true, proxies: { 'all://': 'socks5h://127.0.0.1:9050' } })).toBeInstanceOf(
      AxiosHttpClient,
    );
    expect(create({ enableHttp2: true, proxies: { 'https://': 'http://proxy.example.com:3128' } })).toBeInstanceOf(
      AxiosHttpClient,
    );
  });
});
