/**
 * HTTP client for page and endpoint requests
 *
 * Handles:
 * - One budget slot per attempt (acquire before, release after)
 * - Retry with jittered exponential backoff on network errors, 429 and 5xx
 * - Retry-After on 429
 * - Per-attempt timeout, run-level abort
 */

import { FetchTextOptions, Logger, PageFetcher, RequestBudget } from '../adapters/DataSourceAdapter';
import { HttpStatusError, TransientNetworkError, errMsg } from './errors';
import { sleep } from './rate-limiter';

export interface FetchResponseLike {
  status: number;
  ok: boolean;
  headers: { get(name: string): string | null };
  text(): Promise<string>;
}

export type FetchLike = (
  url: string,
  init: { headers: Record<string, string>; signal: AbortSignal },
) => Promise<FetchResponseLike>;

export interface RetryConfig {
  maxAttempts: number;
  initialDelayMs: number;
  maxDelayMs: number;
}

export interface HttpClientOptions {
  budget: RequestBudget;
  userAgent: string;
  timeoutMs: number;
  retry: RetryConfig;
  fetchImpl?: FetchLike;
  logger?: Logger;
  /** Jitter source, overridable for deterministic tests */
  random?: () => number;
}

const RETRYABLE_STATUS = new Set([429, 500, 502, 503, 504]);

const defaultFetch: FetchLike = (url, init) => fetch(url, init);

export class HttpClient implements PageFetcher {
  private options: HttpClientOptions;
  private fetchImpl: FetchLike;
  private logger: Logger;
  private random: () => number;

  constructor(options: HttpClientOptions) {
    this.options = options;
    this.fetchImpl = options.fetchImpl ?? defaultFetch;
    this.logger = options.logger ?? console;
    this.random = options.random ?? Math.random;
  }

  async fetchText(url: string, options: FetchTextOptions = {}): Promise<string> {
    const { retry } = this.options;
    const headers = { 'User-Agent': this.options.userAgent, ...options.headers };
    let backoff = retry.initialDelayMs;
    let lastError: unknown = null;
    let lastStatus: number | undefined;

    for (let attempt = 1; attempt <= retry.maxAttempts; attempt++) {
      let waitMs = backoff;

      await this.options.budget.acquire(options.signal);
      const controller = new AbortController();
      const onAbort = () => controller.abort(options.signal?.reason);
      options.signal?.addEventListener('abort', onAbort, { once: true });
      const timeout = setTimeout(() => controller.abort(new Error('timeout')), this.options.timeoutMs);

      try {
        const response = await this.fetchImpl(url, { headers, signal: controller.signal });

        if (response.ok) {
          return await response.text();
        }

        lastStatus = response.status;
        if (!RETRYABLE_STATUS.has(response.status)) {
          const body = await response.text();
          throw new HttpStatusError(response.status, url, body.substring(0, 200));
        }

        if (response.status === 429) {
          const retryAfter = Number(response.headers.get('Retry-After'));
          if (Number.isFinite(retryAfter) && retryAfter > 0) waitMs = retryAfter * 1000;
          this.logger.warn(`[HTTP] Rate limited on ${url}, waiting ${waitMs}ms...`);
        } else {
          this.logger.warn(`[HTTP] ${response.status} on ${url} (attempt ${attempt}/${retry.maxAttempts})`);
        }
        lastError = new Error(`HTTP ${response.status}`);
      } catch (error) {
        if (error instanceof HttpStatusError) throw error;
        if (options.signal?.aborted) throw error;
        lastError = error;
        this.logger.warn(`[HTTP] ${errMsg(error)} on ${url} (attempt ${attempt}/${retry.maxAttempts})`);
      } finally {
        clearTimeout(timeout);
        options.signal?.removeEventListener('abort', onAbort);
        this.options.budget.release();
      }

      if (attempt < retry.maxAttempts) {
        const jitter = this.random() * 250;
        await sleep(Math.min(waitMs, retry.maxDelayMs) + jitter, options.signal);
        backoff = Math.min(backoff * 2, retry.maxDelayMs);
      }
    }

    throw new TransientNetworkError(
      `Request failed after ${retry.maxAttempts} attempts: ${errMsg(lastError)}`,
      url,
      retry.maxAttempts,
      lastStatus,
      { cause: lastError },
    );
  }
}
