import { describe, it, expect } from 'vitest';
import { Dispatcher } from './dispatcher.js';
import { NetworkResponse } from '../client/response.js';
import { parseSettings } from '../config/settings.js';
import {
  ProtocolDisabledError,
  RequestTimeoutError,
  TooManyRequestsError,
  TransportError,
} from '../errors.js';
import { NetworkRegistry } from '../network/registry.js';
import { NetworkMetrics } from '../observability/metrics.js';
import { ManualClock, StubTransport, type StubStep } from '../testing/stub-http-client.js';

const url = 'https://search.example.com/search?q=test';

function dispatcher(
  raw: unknown,
  transport: StubTransport,
  options: { clock?: ManualClock; metrics?: NetworkMetrics } = {},
): Dispatcher {
  const registry = NetworkRegistry.fromSettings(parseSettings(raw), {
    clientFactory: transport.factory,
    clock: options.clock?.now,
  });
  return new Dispatcher(registry, { metrics: options.metrics });
}

describe('Dispatcher', () => {
  it('retries a GET on the default network', async () => {
    const transport = new StubTransport([{ status: 403 }, { status: 200, body: 'results' }]);
    const subject = dispatcher({ outgoing: { retries: 1, retry_on_http_error: 403 } }, transport);

    const response = await subject.get(url);

    expect(response.status).toBe(200);
    expect(response.text()).toBe('results');
    expect(transport.replied).toEqual([403, 200]);
  });

  it('follows redirects on GET only', async () => {
    const transport = new StubTransport();
    const subject = dispatcher({}, transport);

    await subject.get(url);
    await subject.post(url, { data: { q: 'test' } });
    await subject.head(url, { allowRedirects: true });

    expect(transport.calls.map((call) => [call.request.method, call.request.options.allowRedirects])).toEqual([
      ['GET', true],
      ['POST', false],
      ['HEAD', true],
    ]);
  });

  it('raises for HTTP errors when asked to', async () => {
    const transport = new StubTransport([{ status: 429 }, { status: 429 }]);
    const subject = dispatcher({}, transport);

    await expect(subject.get(url, { raiseForHttpError: true })).rejects.toBeInstanceOf(TooManyRequestsError);
    await expect(subject.get(url)).resolves.toHaveProperty('status', 429);
  });

  it('refuses plain HTTP unless the network enables it', async () => {
    const transport = new StubTransport();
    const subject = dispatcher({ outgoing: { networks: { legacy: { enable_http: true } } } }, transport);

    await expect(subject.get('http://search.example.com/')).rejects.toBeInstanceOf(ProtocolDisabledError);
    expect(transport.calls).toHaveLength(0);

    await expect(subject.get('http://search.example.com/', { network: 'legacy' })).resolves.toHaveProperty(
      'status',
      200,
    );
  });

  it('keeps the other results of a multi-request when one fails', async () => {
    const byUrl: StubStep = (request) =>
      request.url.endsWith('/b') ? new TransportError('connection refused', { code: 'ECONNREFUSED' }) : { status: 200 };
    const transport = new StubTransport([byUrl, byUrl, byUrl]);
    const subject = dispatcher({}, transport);

    const results = await subject.multiRequest([
      { method: 'GET', url: 'https://a.example.com/a' },
      { method: 'GET', url: 'https://b.example.com/b' },
      { method: 'POST', url: 'https://c.example.com/c', options: { json: { q: 'test' } } },
    ]);

    expect(results).toHaveLength(3);
    expect(results[0]).toBeInstanceOf(NetworkResponse);
    expect(results[1]).toBeInstanceOf(TransportError);
    expect(results[2]).toBeInstanceOf(NetworkResponse);
  });

  it('closes a stream that is abandoned early', async () => {
    const transport = new StubTransport([{ status: 200, body: 'first|second|third' }]);
    const subject = dispatcher({}, transport);

    const response = await subject.stream('GET', url);
    const chunks: string[] = [];
    for await (const chunk of response) {
      chunks.push(chunk.toString());
      break;
    }

    expect(chunks).toEqual(['first']);
    expect(transport.streams[0]).toBe(response);
    expect(response.isClosed).toBe(true);
  });

  it('raises for an error status on a stream and closes it', async () => {
    const transport = new StubTransport([{ status: 429, body: 'slow|down' }, { status: 200, body: 'ok' }]);
    const subject = dispatcher({}, transport);

    const failure = await subject.stream('GET', url, { raiseForHttpError: true }).catch((error: unknown) => error);

    expect(failure).toBeInstanceOf(TooManyRequestsError);
    expect(failure instanceof TooManyRequestsError && failure.response.text()).toBe('slowdown');
    expect(transport.streams[0]?.isClosed).toBe(true);

    const response = await subject.stream('GET', url, { raiseForHttpError: true });
    expect(response.isClosed).toBe(false);
    await expect(response.readAll()).resolves.toEqual(Buffer.from('ok'));
  });

  it('reruns a call on a network with the engine strategy', async () => {
    const transport = new StubTransport([{ status: 503 }, { status: 200, body: 'page' }]);
    const subject = dispatcher(
      { outgoing: { networks: { scraping: { retries: 1, retry_on_http_error: [503], retry_strategy: 'engine' } } } },
      transport,
    );
    let runs = 0;

    const text = await subject.call(
      async (http) => {
        runs += 1;
        const response = await http.get(url);
        return response.text();
      },
      { network: 'scraping' },
    );

    expect(text).toBe('page');
    expect(runs).toBe(2);
    expect(transport.clients).toHaveLength(1);
  });

  it('bounds engine sessions by the engine timeout', async () => {
    const transport = new StubTransport();
    const subject = dispatcher({ engines: [{ name: 'bing', timeout: 2.5 }] }, transport, { clock: new ManualClock() });

    const session = subject.forEngine('bing');
    await session.get(url);

    expect(session.network.name).toBe('bing');
    expect(transport.calls[0]?.timeoutMs).toBe(2700);
  });

  it('records outcomes and HTTP time', async () => {
    const clock = new ManualClock();
    const metrics = new NetworkMetrics();
    const transport = new StubTransport(
      [{ status: 200, durationMs: 40 }, new TransportError('connection refused')],
      clock,
    );
    const subject = dispatcher({}, transport, { clock, metrics });
    const session = subject.session();

    await session.get(url);
    await expect(session.get(url)).rejects.toBeInstanceOf(TransportError);

    expect(session.httpTimeMs).toBe(40);
    expect(metrics.snapshot()).toEqual({
      counters: {
        '__default__.requests.total': 2,
        '__default__.requests.success': 1,
        '__default__.requests.error': 1,
      },
      httpTime: { __default__: { count: 2, min: 0, max: 40, avg: 20, total: 40 } },
    });
  });

  it('counts a spent time budget as a timeout', async () => {
    const clock = new ManualClock();
    const metrics = new NetworkMetrics();
    const transport = new StubTransport([{ status: 403, durationMs: 500 }], clock);
    const subject = dispatcher({ outgoing: { retries: 1, retry_on_http_error: 403 } }, transport, { clock, metrics });

    await expect(subject.session(undefined, { timeoutMs: 100 }).get(url)).rejects.toBeInstanceOf(RequestTimeoutError);

    expect(metrics.snapshot().counters['__default__.requests.timeout']).toBe(1);
  });

  it('shuts the registry down once', async () => {
    const transport = new StubTransport();
    const subject = dispatcher({}, transport);
    await subject.get(url);

    await Promise.all([subject.shutdown(), subject.shutdown()]);

    expect(transport.clients.map((client) => client.closeCount)).toEqual([1]);
  });
});
