import type { ProxySelection, ProxyTable } from '../types.js';

type ProxyCursor = {
  pattern: string;
  urls: readonly string[];
  position: number;
};

/**
 * Each pattern keeps its own cursor: `{ https: [p1, p2], http: [p3] }`
 * yields `{https: p1, http: p3}`, `{https: p2, http: p3}`, `{https: p1, http: p3}`...
 */
export class ProxyRotator {
  private readonly cursors: ProxyCursor[];

  constructor(proxies: ProxyTable) {
    this.cursors = Object.entries(proxies)
      .filter(([, urls]) => urls.length > 0)
      .map(([pattern, urls]) => ({ pattern, urls, position: 0 }));
  }

  get isEmpty(): boolean {
    return this.cursors.length === 0;
  }

  get patterns(): string[] {
    return this.cursors.map((cursor) => cursor.pattern);
  }

  nextProxySet(): ProxySelection | undefined {
    if (this.cursors.length === 0) {
      return undefined;
    }

    const selection: Record<string, string> = {};
    for (const cursor of this.cursors) {
      const url = cursor.urls[cursor.position];
      cursor.position = (cursor.position + 1) % cursor.urls.length;
      if (url !== undefined) {
        selection[cursor.pattern] = url;
      }
    }

    return selection;
  }
}
