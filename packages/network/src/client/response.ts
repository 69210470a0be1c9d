import type { Readable } from 'node:stream';
import type { HttpMethod } from '../types.js';

type ResponseHead = {
  status: number;
  statusText: string;
  /** Lower-cased names; repeated headers joined with `, `. */
  headers: Readonly<Record<string, string>>;
  setCookies: readonly string[];
  /** Final URL after redirects. */
  url: string;
  method: HttpMethod;
  /** `HTTP/1.1`, `HTTP/2.0`; undefined where the transport does not report it. */
  httpVersion: string | undefined;
  clientId: string;
  elapsedMs: number;
};

/** Anything the retry loop may throw away before the next attempt. */
type ReleasableResponse = {
  readonly status: number;
  release(): void;
};

export function isErrorStatus(status: number): boolean {
  return status >= 400 && status <= 599;
}

abstract class ResponseBase implements ReleasableResponse {
  readonly status: number;
  readonly statusText: string;
  readonly headers: Readonly<Record<string, string>>;
  readonly setCookies: readonly string[];
  readonly url: string;
  readonly method: HttpMethod;
  readonly httpVersion: string | undefined;
  readonly clientId: string;
  readonly elapsedMs: number;

  constructor(head: ResponseHead) {
    this.status = head.status;
    this.statusText = head.statusText;
    this.headers = head.headers;
    this.setCookies = head.setCookies;
    this.url = head.url;
    this.method = head.method;
    this.httpVersion = head.httpVersion;
    this.clientId = head.clientId;
    this.elapsedMs = head.elapsedMs;
  }

  get ok(): boolean {
    return !isErrorStatus(this.status);
  }

  header(name: string): string | undefined {
    return this.headers[name.toLowerCase()];
  }

  protected head(): ResponseHead {
    return {
      status: this.status,
      statusText: this.statusText,
      headers: this.headers,
      setCookies: this.setCookies,
      url: this.url,
      method: this.method,
      httpVersion: this.httpVersion,
      clientId: this.clientId,
      elapsedMs: this.elapsedMs,
    };
  }

  abstract release(): void;
}

/**
 * Fully buffered response. Wraps what the transport returned instead of
 * decorating the transport's own object.
 */
class NetworkResponse extends ResponseBase {
  readonly body: Buffer;

  constructor(head: ResponseHead, body: Buffer) {
    super(head);
    this.body = body;
  }

  text(encoding: BufferEncoding = 'utf-8'): string {
    return this.body.toString(encoding);
  }

  json(): unknown {
    const parsed: unknown = JSON.parse(this.text());
    return parsed;
  }

  release(): void {}
}

/**
 * Response whose body is read lazily. Leaving the iteration for any reason
 * (end, `break`, exception) destroys the socket.
 */
class StreamResponse extends ResponseBase implements AsyncIterable<Buffer> {
  private readonly body: Readable;
  private closed: boolean;

  constructor(head: ResponseHead, body: Readable) {
    super(head);
    this.body = body;
    this.closed = false;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<Buffer, void, undefined> {
    try {
      for await (const chunk of this.body) {
        if (Buffer.isBuffer(chunk)) {
          yield chunk;
        } else if (typeof chunk === 'string' || chunk instanceof Uint8Array) {
          yield Buffer.from(chunk);
        }
      }
    } finally {
      this.close();
    }
  }

  async readAll(): Promise<Buffer> {
    const chunks: Buffer[] = [];
    for await (const chunk of this) {
      chunks.push(chunk);
    }
    return Buffer.concat(chunks);
  }

  /** Reads the rest of the body and closes the stream. */
  async buffer(): Promise<NetworkResponse> {
    return new NetworkResponse(this.head(), await this.readAll());
  }

  close(): void {
    if (this.closed) {
      return;
    }

    this.closed = true;
    this.body.destroy();
  }

  release(): void {
    this.close();
  }
}

export { NetworkResponse, StreamResponse };
export type { ResponseHead, ReleasableResponse };
