type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE' | 'HEAD' | 'OPTIONS';

type QueryValue = string | number | boolean;

type RequestOptions = {
  params?: Record<string, QueryValue | readonly QueryValue[]>;
  headers?: Record<string, string>;
  cookies?: Record<string, string>;
  /** Form fields, or an already encoded form body. */
  data?: Record<string, string> | string;
  json?: unknown;
  content?: string | Buffer | Uint8Array;
  auth?: { username: string; password: string };
  /** Overrides the context timeout when computing this request's remaining time. */
  timeoutMs?: number;
  allowRedirects?: boolean;
  maxRedirects?: number;
  verify?: boolean | string;
  raiseForHttpError?: boolean;
};

type PreparedRequest = {
  method: HttpMethod;
  url: string;
  options: RequestOptions;
};

type RequestDescriptor = {
  method: HttpMethod;
  url: string;
  options?: RequestOptions;
};

/** Pattern (`all://`, `https://`, `https://bing.com`) to proxy URL for one rotation turn. */
type ProxySelection = Readonly<Record<string, string>>;

type ProxyTable = Readonly<Record<string, readonly string[]>>;

/** Per-request values that select a different pooled client. */
type ClientOverrides = {
  verify?: boolean | string;
  maxRedirects?: number;
};

type ClientKey = {
  verify: boolean | string;
  maxRedirects: number;
  localAddress: string | undefined;
  proxies: ProxySelection | undefined;
};

type Clock = () => number;

export type {
  HttpMethod,
  QueryValue,
  RequestOptions,
  PreparedRequest,
  RequestDescriptor,
  ProxySelection,
  ProxyTable,
  ClientOverrides,
  ClientKey,
  Clock,
};
