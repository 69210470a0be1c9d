import * as cheerio from 'cheerio'
import { log } from '@workspace/logger'
import type { NetworkResponse } from '../client/response.js'

type Challenge = 'cloudflare-challenge' | 'cloudflare-firewall' | 'recaptcha'

const CLOUDFLARE_TOKENS = ['__cf_chl_jschl_tk__=', '__cf_chl_captcha_tk__=', 'window._cf_chl_opt', 'window._cf_chl_enter(']

function isCloudflare(response: NetworkResponse): boolean {
  return (response.header('server') ?? '').toLowerCase().startsWith('cloudflare')
}

function isHtml(response: NetworkResponse): boolean {
  const contentType = response.header('content-type')
  return contentType === undefined || contentType.includes('html')
}

/**
 * Recognizes anti-bot pages served instead of results. Only error
 * responses are inspected.
 */
export function detectChallenge(response: NetworkResponse): Challenge | undefined {
  if (response.ok || !isHtml(response)) {
    return undefined
  }

  const html = response.text()
  const $ = cheerio.load(html)

  if (isCloudflare(response)) {
    // 1020: blocked by a firewall rule, no challenge to solve
    if (response.status === 403 && $('.cf-error-code').first().text().trim() === '1020') {
      return 'cloudflare-firewall'
    }

    const challengeMarkup =
      $('#cf-challenge-running').length > 0 ||
      $('.cf-browser-verification').length > 0 ||
      $('script[src*="/cdn-cgi/challenge-platform/"]').length > 0 ||
      CLOUDFLARE_TOKENS.some(token => html.includes(token))

    if (challengeMarkup && [403, 429, 503].includes(response.status)) {
      log.debug(`Cloudflare challenge on ${response.url}`)
      return 'cloudflare-challenge'
    }
  }

  const recaptcha =
    $('iframe[src*="recaptcha/api2/bframe"]').length > 0 ||
    $('script[src^="https://www.google.com/recaptcha/"]').length > 0 ||
    html.includes('"https://www.google.com/recaptcha/')

  if (recaptcha && response.status === 503) {
    log.debug(`reCAPTCHA on ${response.url}`)
    return 'recaptcha'
  }

  return undefined
}

export type { Challenge }
