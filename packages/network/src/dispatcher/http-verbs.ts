import type { NetworkResponse, StreamResponse } from '../client/response.js';
import type { HttpMethod, PreparedRequest, RequestOptions } from '../types.js';

/** Only GET follows redirects unless told otherwise. */
export function prepareRequest(method: HttpMethod, url: string, options: RequestOptions = {}): PreparedRequest {
  return {
    method,
    url,
    options: { ...options, allowRedirects: options.allowRedirects ?? method === 'GET' },
  };
}

/**
 * Verb shortcuts over `request()`, shared by everything that sends requests.
 */
export abstract class HttpVerbs<O extends RequestOptions = RequestOptions> {
  abstract request(method: HttpMethod, url: string, options?: O): Promise<NetworkResponse>;

  abstract stream(method: HttpMethod, url: string, options?: O): Promise<StreamResponse>;

  get(url: string, options?: O): Promise<NetworkResponse> {
    return this.request('GET', url, options);
  }

  post(url: string, options?: O): Promise<NetworkResponse> {
    return this.request('POST', url, options);
  }

  put(url: string, options?: O): Promise<NetworkResponse> {
    return this.request('PUT', url, options);
  }

  patch(url: string, options?: O): Promise<NetworkResponse> {
    return this.request('PATCH', url, options);
  }

  delete(url: string, options?: O): Promise<NetworkResponse> {
    return this.request('DELETE', url, options);
  }

  head(url: string, options?: O): Promise<NetworkResponse> {
    return this.request('HEAD', url, options);
  }

  options(url: string, options?: O): Promise<NetworkResponse> {
    return this.request('OPTIONS', url, options);
  }
}
