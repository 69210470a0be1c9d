import { describe, it, expect } from 'vitest';
import { raiseForHttpError } from './raise-for-http-error.js';
import { detectChallenge } from './challenge-detector.js';
import { NetworkResponse } from '../client/response.js';
import {
  AccessDeniedError,
  CaptchaError,
  HttpStatusError,
  TooManyRequestsError,
} from '../errors.js';

function responseOf(status: number, body = '', headers: Record<string, string> = {}, statusText = ''): NetworkResponse {
  return new NetworkResponse(
    {
      status,
      statusText,
      headers,
      setCookies: [],
      url: 'https://search.example.com/search?q=test',
      method: 'GET',
      httpVersion: 'HTTP/1.1',
      clientId: 'client-1',
      elapsedMs: 12,
    },
    Buffer.from(body),
  );
}

const cloudflareChallenge =
  '<html><head><title>Just a moment...</title></head><body>' +
  '<div id="cf-challenge-running"></div>' +
  '<script src="/cdn-cgi/challenge-platform/h/g/orchestrate/jsch/v1"></script></body></html>';

describe('raiseForHttpError', () => {
  it('lets successful and redirect responses through', () => {
    expect(() => raiseForHttpError(responseOf(200))).not.toThrow();
    expect(() => raiseForHttpError(responseOf(302))).not.toThrow();
  });

  it('maps 402 and 403 to access denied', () => {
    expect(() => raiseForHttpError(responseOf(402))).toThrow(AccessDeniedError);
    expect(() => raiseForHttpError(responseOf(403, '', {}, 'Forbidden'))).toThrow(
      'HTTP 403 Forbidden from https://search.example.com/search?q=test',
    );
  });

  it('maps 429 to too many requests', () => {
    expect(() => raiseForHttpError(responseOf(429))).toThrow(TooManyRequestsError);
  });

  it('keeps the response on generic status errors', () => {
    const response = responseOf(500, 'oops');

    const error = (() => {
      try {
        raiseForHttpError(response);
      } catch (caught) {
        return caught;
      }
      return undefined;
    })();

    expect(error).toBeInstanceOf(HttpStatusError);
    expect(error).not.toBeInstanceOf(AccessDeniedError);
    expect(error).toHaveProperty('status', 500);
    expect(error).toHaveProperty('response', response);
  });

  it('recognizes a Cloudflare challenge', () => {
    const response = responseOf(503, cloudflareChallenge, { server: 'cloudflare', 'content-type': 'text/html' });

    expect(() => raiseForHttpError(response)).toThrow(CaptchaError);
    expect(detectChallenge(response)).toBe('cloudflare-challenge');
  });

  it('recognizes the Cloudflare firewall', () => {
    const body = '<html><body><span class="cf-error-code">1020</span></body></html>';
    const response = responseOf(403, body, { server: 'cloudflare' });

    expect(() => raiseForHttpError(response)).toThrow('Cloudflare firewall blocked https://search.example.com/search?q=test');
  });

  it('ignores challenge markup from other servers', () => {
    const response = responseOf(503, cloudflareChallenge, { server: 'nginx' });

    expect(detectChallenge(response)).toBeUndefined();
    expect(() => raiseForHttpError(response)).toThrow(HttpStatusError);
  });

  it('recognizes reCAPTCHA pages', () => {
    const body = '<html><body><script src="https://www.google.com/recaptcha/api.js"></script></body></html>';
    const response = responseOf(503, body, { 'content-type': 'text/html; charset=utf-8' });

    expect(detectChallenge(response)).toBe('recaptcha');
    expect(() => raiseForHttpError(response)).toThrow('CAPTCHA challenge (recaptcha) from https://search.example.com/search?q=test');
  });

  it('does not inspect non-HTML bodies', () => {
    const response = responseOf(503, '{"error":"https://www.google.com/recaptcha/"}', {
      'content-type': 'application/json',
    });

    expect(detectChallenge(response)).toBeUndefined();
  });
});
