import { FetchTextOptions, PageFetcher } from '../../adapters/DataSourceAdapter';
import { HttpStatusError } from '../../lib/errors';

type Route = string | Error | (() => string);

/** In-memory PageFetcher: exact URL -> body (or error) */
export class StubFetcher implements PageFetcher {
  readonly calls: Array<{ url: string; headers: Record<string, string> }> = [];

  constructor(private routes: Record<string, Route> = {}) {}

  set(url: string, route: Route): this {
    this.routes[url] = route;
    return this;
  }

  async fetchText(url: string, options: FetchTextOptions = {}): Promise<string> {
    this.calls.push({ url, headers: options.headers ?? {} });
    const route = this.routes[url];
    if (route === undefined) throw new HttpStatusError(404, url, '');
    if (route instanceof Error) throw route;
    return typeof route === 'function' ? route() : route;
  }

  urls(): string[] {
    return this.calls.map((c) => c.url);
  }
}

export async function collect<T>(source: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of source) items.push(item);
  return items;
}

/** Event header element the way match pages carry it */
export function eventHeader(eventData: Record<string, unknown>): string {
  const json = JSON.stringify({ eventData }).replace(/&/g, '&amp;').replace(/"/g, '&quot;');
  return `<div id="react-event-header" data="${json}"></div>`;
}
