import { STATUS_CODES } from 'http'
import { Agent, errors, request as undiciRequest, type Dispatcher } from 'undici'
import { createLogger, type Logger } from '@workspace/logger'
import {
  ConfigurationError,
  RemoteDisconnectedError,
  TransportError,
  TransportTimeoutError
} from '../errors.js'
import { HttpClient, type HttpClientOptions, type SendOptions } from './http-client.js'
import {
  buildBody,
  buildHeaders,
  buildUrl,
  loadCertificateAuthority,
  normalizeHeaders,
  type RequestBody
} from './request-parts.js'
import { NetworkResponse, StreamResponse, type ResponseHead } from './response.js'
import type { HttpMethod, PreparedRequest } from '../types.js'

const DISCONNECT_CODES = new Set(['ECONNRESET', 'EPIPE'])
const REDIRECT_STATUSES = new Set([301, 302, 303, 307, 308])
// undici's own ceiling for server keep-alive hints
const UNBOUNDED_KEEPALIVE_MS = 600_000

type Hop = {
  method: HttpMethod
  url: string
  headers: Record<string, string>
  body: RequestBody | undefined
}

function systemErrorCode(error: unknown): string | undefined {
  return error instanceof Error && 'code' in error && typeof error.code === 'string' ? error.code : undefined
}

function firstHeader(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value
}

/** 303, and 301/302 after anything but GET or HEAD, drop the body and switch to GET; HEAD stays HEAD. */
function nextHop(hop: Hop, status: number, location: string): Hop {
  const url = new URL(location, hop.url).toString()
  const becomesGet = status === 303 || ((status === 301 || status === 302) && hop.method !== 'GET' && hop.method !== 'HEAD')
  if (!becomesGet) {
    return { ...hop, url }
  }

  const headers = Object.fromEntries(
    Object.entries(hop.headers).filter(([name]) => !['content-type', 'content-length'].includes(name.toLowerCase()))
  )
  return { method: hop.method === 'HEAD' ? 'HEAD' : 'GET', url, headers, body: undefined }
}

export function hasProxies(options: Pick<HttpClientOptions, 'proxies'>): boolean {
  return options.proxies !== undefined && Object.keys(options.proxies).length > 0
}

/**
 * Direct-connection HttpClient on undici: HTTP/2 is offered over TLS (ALPN)
 * next to HTTP/1.1. Redirects are followed here so the final URL is known.
 */
export class UndiciHttpClient extends HttpClient {
  private readonly agent: Agent
  private readonly logger: Logger
  private closed: boolean

  constructor(options: HttpClientOptions, logger: Logger = createLogger('http-client')) {
    if (hasProxies(options)) {
      throw new ConfigurationError('The HTTP/2 client only makes direct connections; proxied networks use the HTTP/1.1 client')
    }

    super(options)
    this.logger = logger.child({ client: this.id })
    this.closed = false
    this.agent = new Agent({
      allowH2: true,
      localAddress: options.localAddress,
      connections: Number.isFinite(options.maxConnections) ? options.maxConnections : null,
      keepAliveTimeout: options.keepaliveExpiryMs ?? UNBOUNDED_KEEPALIVE_MS,
      connect: {
        rejectUnauthorized: options.verify !== false,
        ca: loadCertificateAuthority(options.verify)
      }
    })

    this.logger.trace('HTTP client created', { localAddress: options.localAddress, http2: true })
  }

  get isClosed(): boolean {
    return this.closed
  }

  async close(): Promise<void> {
    if (this.closed) return

    this.closed = true
    await this.agent.destroy()
    this.logger.trace('HTTP client closed')
  }

  protected async performSend(request: PreparedRequest, options: SendOptions): Promise<NetworkResponse> {
    return this.exchange(request, options, async (response, head) => {
      const body = Buffer.from(await response.body.arrayBuffer())
      return new NetworkResponse(head, body)
    })
  }

  protected async performStream(request: PreparedRequest, options: SendOptions): Promise<StreamResponse> {
    return this.exchange(request, options, async (response, head) => new StreamResponse(head, response.body))
  }

  private async exchange<T>(
    request: PreparedRequest,
    { timeoutMs }: SendOptions,
    read: (response: Dispatcher.ResponseData, head: ResponseHead) => Promise<T>
  ): Promise<T> {
    const headers = buildHeaders(request.options)
    const body = buildBody(request.options, headers)
    let hop: Hop = { method: request.method, url: buildUrl(request.url, request.options.params), headers, body }
    const controller = new AbortController()
    const timer = setTimeout(() => controller.abort(), timeoutMs)
    const startTime = Date.now()

    try {
      for (let redirects = 0; ; redirects += 1) {
        const response = await undiciRequest(hop.url, {
          method: hop.method,
          headers: hop.headers,
          body: hop.body,
          signal: controller.signal,
          dispatcher: this.agent,
          headersTimeout: timeoutMs,
          bodyTimeout: timeoutMs
        })

        const location = firstHeader(response.headers.location)
        if (request.options.allowRedirects && REDIRECT_STATUSES.has(response.statusCode) && location) {
          await response.body.dump()
          if (redirects >= this.options.maxRedirects) {
            throw new TransportError(`${request.method} ${request.url}: exceeded ${this.options.maxRedirects} redirects`, {
              code: 'ERR_TOO_MANY_REDIRECTS'
            })
          }
          hop = nextHop(hop, response.statusCode, location)
          continue
        }

        const { headers: responseHeaders, setCookies } = normalizeHeaders(response.headers)
        const head: ResponseHead = {
          status: response.statusCode,
          statusText: STATUS_CODES[response.statusCode] ?? '',
          headers: responseHeaders,
          setCookies,
          url: hop.url,
          method: request.method,
          httpVersion: undefined,
          clientId: this.id,
          elapsedMs: Date.now() - startTime
        }

        this.logger.debug(`HTTP Request: ${request.method} ${head.url} "${head.status} ${head.statusText}"`)
        return await read(response, head)
      }
    } catch (error) {
      throw this.toTransportError(error, request, timeoutMs, controller.signal.aborted)
    } finally {
      clearTimeout(timer)
    }
  }

  private toTransportError(error: unknown, request: PreparedRequest, timeoutMs: number, aborted: boolean): unknown {
    const target = `${request.method} ${request.url}`

    if (error instanceof TransportError) {
      return error
    }

    if (aborted) {
      return new TransportTimeoutError(`${target} timed out after ${timeoutMs}ms`, { cause: error, code: 'ETIMEDOUT' })
    }

    if (
      error instanceof errors.HeadersTimeoutError ||
      error instanceof errors.BodyTimeoutError ||
      error instanceof errors.ConnectTimeoutError
    ) {
      return new TransportTimeoutError(`${target} timed out after ${timeoutMs}ms`, { cause: error, code: error.code })
    }

    if (error instanceof errors.SocketError) {
      return new RemoteDisconnectedError(`${target}: server disconnected`, { cause: error, code: error.code })
    }

    if (error instanceof errors.UndiciError) {
      return new TransportError(`${target}: ${error.message}`, { cause: error, code: error.code })
    }

    const code = systemErrorCode(error)
    if (code && DISCONNECT_CODES.has(code)) {
      return new RemoteDisconnectedError(`${target}: server disconnected`, { cause: error, code })
    }
    if (code && error instanceof Error) {
      return new TransportError(`${target}: ${error.message}`, { cause: error, code })
    }

    return error
  }
}
