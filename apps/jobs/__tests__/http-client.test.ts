// Unit tests for retries and status handling in the HTTP client

import { RequestBudget, silentLogger } from '../adapters/DataSourceAdapter';
import { HttpStatusError, TransientNetworkError } from '../lib/errors';
import { FetchLike, FetchResponseLike, HttpClient } from '../lib/http-client';

const PAGE_URL = 'https://odds.example.test/page/';

function response(status: number, body = '', headers: Record<string, string> = {}): FetchResponseLike {
  return {
    status,
    ok: status >= 200 && status < 300,
    headers: { get: (name: string) => headers[name] ?? null },
    text: async () => body,
  };
}

class CountingBudget implements RequestBudget {
  acquired = 0;
  released = 0;

  async acquire(): Promise<void> {
    this.acquired++;
  }

  release(): void {
    this.released++;
  }
}

function client(fetchImpl: FetchLike, budget: RequestBudget = new CountingBudget()): HttpClient {
  return new HttpClient({
    budget,
    userAgent: 'odds-pipeline-test',
    timeoutMs: 1000,
    retry: { maxAttempts: 3, initialDelayMs: 1, maxDelayMs: 5 },
    fetchImpl,
    logger: silentLogger,
    random: () => 0,
  });
}

function scripted(steps: Array<FetchResponseLike | Error>) {
  const seen: Array<Record<string, string>> = [];
  const fetchImpl: FetchLike = async (_url, init) => {
    seen.push(init.headers);
    const step = steps[Math.min(seen.length - 1, steps.length - 1)];
    if (step instanceof Error) throw step;
    return step;
  };
  return { fetchImpl, seen };
}

describe('HTTP client', () => {
  test('retries a 503 and returns the body that follows', async () => {
    const { fetchImpl, seen } = scripted([response(503), response(200, 'ok')]);
    const budget = new CountingBudget();

    await expect(client(fetchImpl, budget).fetchText(PAGE_URL)).resolves.toBe('ok');
    expect(seen).toHaveLength(2);
    expect(budget.acquired).toBe(2);
    expect(budget.released).toBe(2);
  });

  test('404 is not retried', async () => {
    const { fetchImpl, seen } = scripted([response(404, 'not here')]);

    const error = await client(fetchImpl).fetchText(PAGE_URL).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(HttpStatusError);
    expect(error).toMatchObject({ status: 404, url: PAGE_URL, bodyPreview: 'not here' });
    expect(seen).toHaveLength(1);
  });

  test('persistent 500 ends as a transient network error', async () => {
    const { fetchImpl, seen } = scripted([response(500)]);

    const error = await client(fetchImpl).fetchText(PAGE_URL).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(TransientNetworkError);
    expect(error).toMatchObject({ attempts: 3, status: 500, url: PAGE_URL });
    expect(seen).toHaveLength(3);
  });

  test('network errors are retried', async () => {
    const { fetchImpl, seen } = scripted([new Error('ECONNRESET'), response(200, 'ok')]);

    await expect(client(fetchImpl).fetchText(PAGE_URL)).resolves.toBe('ok');
    expect(seen).toHaveLength(2);
  });

  test('sends the user agent alongside caller headers', async () => {
    const { fetchImpl, seen } = scripted([response(200, 'ok')]);

    await client(fetchImpl).fetchText(PAGE_URL, { headers: { Referer: 'https://odds.example.test/' } });
    expect(seen[0]).toEqual({ 'User-Agent': 'odds-pipeline-test', Referer: 'https://odds.example.test/' });
  });

  test('run abort stops retrying', async () => {
    const controller = new AbortController();
    const fetchImpl: FetchLike = async () => {
      controller.abort(new Error('cancelled'));
      throw new Error('cancelled');
    };

    await expect(client(fetchImpl).fetchText(PAGE_URL, { signal: controller.signal })).rejects.toThrow('cancelled');
  });
});
