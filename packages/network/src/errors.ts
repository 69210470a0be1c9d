import type { NetworkResponse } from './client/response.js';

class NetworkError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'NetworkError';
  }
}

/**
 * Invalid settings, invalid proxy or address, failed Tor verification.
 * Raised while building or checking networks; never retried.
 */
class ConfigurationError extends NetworkError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConfigurationError';
  }
}

class TransportError extends NetworkError {
  readonly code: string | undefined;

  constructor(message: string, options?: { cause?: unknown; code?: string }) {
    super(message, options);
    this.name = 'TransportError';
    this.code = options?.code;
  }
}

class TransportTimeoutError extends TransportError {
  constructor(message: string, options?: { cause?: unknown; code?: string }) {
    super(message, options);
    this.name = 'TransportTimeoutError';
  }
}

/** The peer closed a kept-alive connection before answering. */
class RemoteDisconnectedError extends TransportError {
  constructor(message: string, options?: { cause?: unknown; code?: string }) {
    super(message, options);
    this.name = 'RemoteDisconnectedError';
  }
}

class HttpStatusError extends NetworkError {
  readonly response: NetworkResponse;

  constructor(message: string, response: NetworkResponse) {
    super(message);
    this.name = 'HttpStatusError';
    this.response = response;
  }

  get status(): number {
    return this.response.status;
  }
}

class AccessDeniedError extends HttpStatusError {
  constructor(message: string, response: NetworkResponse) {
    super(message, response);
    this.name = 'AccessDeniedError';
  }
}

class TooManyRequestsError extends HttpStatusError {
  constructor(message: string, response: NetworkResponse) {
    super(message, response);
    this.name = 'TooManyRequestsError';
  }
}

class CaptchaError extends HttpStatusError {
  readonly challenge: string;

  constructor(challenge: string, response: NetworkResponse) {
    super(`CAPTCHA challenge (${challenge}) from ${response.url}`, response);
    this.name = 'CaptchaError';
    this.challenge = challenge;
  }
}

/** The request context has no time left for another attempt. */
class RequestTimeoutError extends NetworkError {
  readonly httpTimeMs: number;

  constructor(message: string, httpTimeMs: number) {
    super(message);
    this.name = 'RequestTimeoutError';
    this.httpTimeMs = httpTimeMs;
  }
}

/** Retry signal consumed by the retry strategies; never reaches callers. */
class SoftRetryError extends NetworkError {
  constructor(message: string) {
    super(message);
    this.name = 'SoftRetryError';
  }
}

class ProtocolDisabledError extends NetworkError {
  constructor(url: string) {
    super(`HTTP is disabled on this network, refusing ${url}`);
    this.name = 'ProtocolDisabledError';
  }
}

class RetryStateError extends NetworkError {
  constructor(message = 'Internal error: retries exhausted without a terminal state') {
    super(message);
    this.name = 'RetryStateError';
  }
}

export {
  NetworkError,
  ConfigurationError,
  TransportError,
  TransportTimeoutError,
  RemoteDisconnectedError,
  HttpStatusError,
  AccessDeniedError,
  TooManyRequestsError,
  CaptchaError,
  RequestTimeoutError,
  SoftRetryError,
  ProtocolDisabledError,
  RetryStateError,
};
