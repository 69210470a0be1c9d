import {
  AccessDeniedError,
  CaptchaError,
  HttpStatusError,
  TooManyRequestsError,
} from '../errors.js';
import type { NetworkResponse, StreamResponse } from '../client/response.js';
import { detectChallenge } from './challenge-detector.js';

/**
 * Turns an error response into the matching `HttpStatusError` subclass.
 * Successful and redirect responses pass through.
 */
export function raiseForHttpError(response: NetworkResponse): void {
  if (response.ok) {
    return;
  }

  const challenge = detectChallenge(response);
  if (challenge === 'cloudflare-firewall') {
    throw new AccessDeniedError(`Cloudflare firewall blocked ${response.url}`, response);
  }
  if (challenge) {
    throw new CaptchaError(challenge, response);
  }

  const summary = `HTTP ${response.status} ${response.statusText}`.trim();

  if (response.status === 402 || response.status === 403) {
    throw new AccessDeniedError(`${summary} from ${response.url}`, response);
  }

  if (response.status === 429) {
    throw new TooManyRequestsError(`${summary} from ${response.url}`, response);
  }

  throw new HttpStatusError(`${summary} from ${response.url}`, response);
}

/** An error stream is read to its end and closed before raising. */
export async function raiseForStreamHttpError(response: StreamResponse): Promise<void> {
  if (response.ok) {
    return;
  }
  raiseForHttpError(await response.buffer());
}
