import { readFileSync } from 'fs'
import { ConfigurationError } from '../errors.js'
import type { RequestOptions } from '../types.js'

type RequestBody = string | Buffer | Uint8Array

export function loadCertificateAuthority(verify: boolean | string): Buffer | undefined {
  if (typeof verify !== 'string') {
    return undefined
  }

  try {
    return readFileSync(verify)
  } catch (error) {
    throw new ConfigurationError(`Cannot read CA bundle ${verify}`, { cause: error })
  }
}

export function buildUrl(url: string, params: RequestOptions['params']): string {
  if (!params) {
    return url
  }

  const target = new URL(url)
  for (const [key, value] of Object.entries(params)) {
    const values = Array.isArray(value) ? value : [value]
    for (const item of values) {
      target.searchParams.append(key, String(item))
    }
  }
  return target.toString()
}

function hasHeader(headers: Record<string, string>, name: string): boolean {
  return Object.keys(headers).some(key => key.toLowerCase() === name)
}

export function buildHeaders(options: RequestOptions): Record<string, string> {
  const headers: Record<string, string> = { ...options.headers }

  if (options.cookies && Object.keys(options.cookies).length > 0) {
    headers.Cookie = Object.entries(options.cookies)
      .map(([name, value]) => `${name}=${value}`)
      .join('; ')
  }

  if (options.auth && !hasHeader(headers, 'authorization')) {
    const credentials = Buffer.from(`${options.auth.username}:${options.auth.password}`).toString('base64')
    headers.Authorization = `Basic ${credentials}`
  }

  return headers
}

/** Encodes `json`, `data` or `content` and sets a content type the caller left out. */
export function buildBody(options: RequestOptions, headers: Record<string, string>): RequestBody | undefined {
  if (options.json !== undefined) {
    if (!hasHeader(headers, 'content-type')) headers['Content-Type'] = 'application/json'
    return JSON.stringify(options.json)
  }

  if (options.data !== undefined) {
    if (!hasHeader(headers, 'content-type')) headers['Content-Type'] = 'application/x-www-form-urlencoded'
    return typeof options.data === 'string' ? options.data : new URLSearchParams(options.data).toString()
  }

  return options.content
}

/** Lower-cases names and joins repeated values; `set-cookie` values are also kept apart. */
export function normalizeHeaders(raw: Readonly<Record<string, unknown>>): {
  headers: Record<string, string>
  setCookies: string[]
} {
  const headers: Record<string, string> = {}
  let setCookies: string[] = []

  for (const [name, value] of Object.entries(raw)) {
    const key = name.toLowerCase()
    if (key === 'set-cookie' && Array.isArray(value)) {
      setCookies = value.map(String)
      headers[key] = setCookies.join(', ')
    } else if (Array.isArray(value)) {
      headers[key] = value.map(String).join(', ')
    } else if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
      headers[key] = String(value)
    }
  }

  return { headers, setCookies }
}

export type { RequestBody }
