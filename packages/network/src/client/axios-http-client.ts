import axios, { AxiosError, type AxiosInstance, type AxiosRequestConfig, type AxiosResponse } from 'axios'
import http from 'http'
import https from 'https'
import { isIP } from 'net'
import { Readable } from 'stream'
import { HttpsProxyAgent } from 'https-proxy-agent'
import { SocksProxyAgent } from 'socks-proxy-agent'
import { createLogger, type Logger } from '@workspace/logger'
import {
  RemoteDisconnectedError,
  TransportError,
  TransportTimeoutError
} from '../errors.js'
import { HttpClient, type HttpClientOptions, type SendOptions } from './http-client.js'
import { isSocksProxy, selectProxy } from './proxy-routing.js'
import { buildBody, buildHeaders, buildUrl, loadCertificateAuthority, normalizeHeaders } from './request-parts.js'
import { NetworkResponse, StreamResponse, type ResponseHead } from './response.js'
import type { PreparedRequest } from '../types.js'

const DISCONNECT_CODES = new Set(['ECONNRESET', 'EPIPE'])
const TIMEOUT_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT', 'ESOCKETTIMEDOUT'])

function finalUrlOf(response: AxiosResponse, fallback: string): string {
  const responseUrl: unknown = response.request?.res?.responseUrl
  return typeof responseUrl === 'string' ? responseUrl : fallback
}

function httpVersionOf(response: AxiosResponse): string {
  const version: unknown = response.request?.res?.httpVersion
  return typeof version === 'string' ? `HTTP/${version}` : 'HTTP/1.1'
}

/**
 * HTTP/1.1 HttpClient on axios with keep-alive Node agents. Proxied targets
 * go through one https-proxy-agent or socks-proxy-agent per proxy URL.
 */
export class AxiosHttpClient extends HttpClient {
  private readonly instance: AxiosInstance
  private readonly agentOptions: https.AgentOptions
  private readonly directAgents: { http: http.Agent; https: https.Agent }
  private readonly proxyAgents: Map<string, http.Agent>
  private readonly logger: Logger
  private closed: boolean

  constructor(options: HttpClientOptions, logger: Logger = createLogger('http-client')) {
    super(options)
    this.logger = logger.child({ client: this.id })
    this.closed = false
    this.proxyAgents = new Map()

    const family = options.localAddress ? isIP(options.localAddress) : 0
    this.agentOptions = {
      keepAlive: true,
      maxSockets: options.maxConnections,
      maxFreeSockets: options.maxKeepaliveConnections,
      timeout: options.keepaliveExpiryMs,
      localAddress: options.localAddress,
      family: family === 0 ? undefined : family,
      rejectUnauthorized: options.verify !== false,
      ca: loadCertificateAuthority(options.verify)
    }

    this.directAgents = {
      http: new http.Agent(this.agentOptions),
      https: new https.Agent(this.agentOptions)
    }

    this.instance = axios.create({
      proxy: false,
      validateStatus: () => true,
      decompress: true
    })

    this.logger.trace('HTTP client created', {
      localAddress: options.localAddress,
      proxies: options.proxies
    })
  }

  get isClosed(): boolean {
    return this.closed
  }

  async close(): Promise<void> {
    if (this.closed) return

    this.closed = true
    this.directAgents.http.destroy()
    this.directAgents.https.destroy()
    for (const agent of this.proxyAgents.values()) {
      agent.destroy()
    }
    this.proxyAgents.clear()
    this.logger.trace('HTTP client closed')
  }

  protected async performSend(request: PreparedRequest, options: SendOptions): Promise<NetworkResponse> {
    const { response, head } = await this.exchange<ArrayBuffer | Buffer>(request, options, 'arraybuffer')
    const body = Buffer.isBuffer(response.data) ? response.data : Buffer.from(response.data)
    return new NetworkResponse(head, body)
  }

  protected async performStream(request: PreparedRequest, options: SendOptions): Promise<StreamResponse> {
    const { response, head } = await this.exchange<unknown>(request, options, 'stream')
    if (!(response.data instanceof Readable)) {
      throw new TransportError(`Streaming is not available for ${request.url}`)
    }
    return new StreamResponse(head, response.data)
  }

  private async exchange<T>(
    request: PreparedRequest,
    { timeoutMs }: SendOptions,
    responseType: 'arraybuffer' | 'stream'
  ): Promise<{ response: AxiosResponse<T>; head: ResponseHead }> {
    const url = buildUrl(request.url, request.options.params)
    const agent = this.agentFor(new URL(url))
    const headers = buildHeaders(request.options)
    const data = buildBody(request.options, headers)
    const controller = new AbortController()
    const timer = setTimeout(() => controller.abort(), timeoutMs)
    const startTime = Date.now()

    const config: AxiosRequestConfig = {
      method: request.method,
      url,
      headers,
      data,
      timeout: timeoutMs,
      signal: controller.signal,
      responseType,
      maxRedirects: request.options.allowRedirects ? this.options.maxRedirects : 0,
      httpAgent: agent,
      httpsAgent: agent
    }

    try {
      const response = await this.instance.request<T>(config)
      const { headers: responseHeaders, setCookies } = normalizeHeaders(response.headers)
      const head: ResponseHead = {
        status: response.status,
        statusText: response.statusText,
        headers: responseHeaders,
        setCookies,
        url: finalUrlOf(response, url),
        method: request.method,
        httpVersion: httpVersionOf(response),
        clientId: this.id,
        elapsedMs: Date.now() - startTime
      }

      this.logger.debug(
        `HTTP Request: ${request.method} ${head.url} "${head.httpVersion} ${head.status} ${head.statusText}"`
      )
      return { response, head }
    } catch (error) {
      throw this.toTransportError(error, request, timeoutMs, controller.signal.aborted)
    } finally {
      clearTimeout(timer)
    }
  }

  private agentFor(target: URL): http.Agent {
    const proxyUrl = selectProxy(this.options.proxies, target)
    if (!proxyUrl) {
      return target.protocol === 'http:' ? this.directAgents.http : this.directAgents.https
    }

    const existing = this.proxyAgents.get(proxyUrl)
    if (existing) return existing

    const agent = isSocksProxy(proxyUrl)
      ? new SocksProxyAgent(proxyUrl, this.agentOptions)
      : new HttpsProxyAgent(proxyUrl, this.agentOptions)
    this.proxyAgents.set(proxyUrl, agent)
    return agent
  }

  private toTransportError(error: unknown, request: PreparedRequest, timeoutMs: number, aborted: boolean): unknown {
    const target = `${request.method} ${request.url}`

    if (aborted) {
      return new TransportTimeoutError(`${target} timed out after ${timeoutMs}ms`, { cause: error, code: 'ETIMEDOUT' })
    }

    if (!(error instanceof AxiosError)) {
      return error
    }

    const code = error.code
    if ((code && DISCONNECT_CODES.has(code)) || error.message.includes('socket hang up')) {
      return new RemoteDisconnectedError(`${target}: server disconnected`, { cause: error, code })
    }

    if (code && TIMEOUT_CODES.has(code)) {
      return new TransportTimeoutError(`${target} timed out after ${timeoutMs}ms`, { cause: error, code })
    }

    return new TransportError(`${target}: ${error.message}`, { cause: error, code })
  }
}
