import type { Logger } from '@workspace/logger'
import { AxiosHttpClient } from './axios-http-client.js'
import type { HttpClient, HttpClientOptions } from './http-client.js'
import { UndiciHttpClient, hasProxies } from './undici-http-client.js'

/**
 * HTTP/2-enabled direct networks get the undici client; networks with HTTP/2
 * disabled or with proxies get the HTTP/1.1 axios client.
 */
export function createHttpClient(options: HttpClientOptions, logger: Logger): HttpClient {
  if (options.enableHttp2 && !hasProxies(options)) {
    return new UndiciHttpClient(options, logger)
  }

  if (options.enableHttp2) {
    logger.debug('Proxied network, using the HTTP/1.1 client', { proxies: options.proxies })
  }
  return new AxiosHttpClient(options, logger)
}
