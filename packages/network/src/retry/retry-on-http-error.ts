import { isErrorStatus } from '../client/response.js';

/**
 * - `true`: any 4xx or 5xx
 * - `false` / `undefined`: never
 * - a number: exactly that status
 * - a list: membership
 */
type RetryOnHttpError = boolean | number | readonly number[] | undefined;

export function shouldRetryStatus(policy: RetryOnHttpError, status: number): boolean {
  if (policy === undefined || policy === false) {
    return false;
  }

  if (policy === true) {
    return isErrorStatus(status);
  }

  if (typeof policy === 'number') {
    return status === policy;
  }

  return policy.includes(status);
}

export type { RetryOnHttpError };
