/**
 * Request budget shared by every stage of a run.
 *
 * Handles:
 * - Max in-flight requests (queued waiters, FIFO)
 * - Burst + sustained window limits
 * - Abort while waiting for a slot
 */

import { RequestBudget } from '../adapters/DataSourceAdapter';

export interface RateLimitConfig {
  burst: number; // Requests per burst window
  sustained: number; // Requests per sustained window
  burstWindowMs: number;
  sustainedWindowMs: number;
  maxConcurrency: number;
}

export const DEFAULT_RATE_LIMIT: RateLimitConfig = {
  burst: 30,
  sustained: 600,
  burstWindowMs: 60 * 1000, // 1 minute
  sustainedWindowMs: 60 * 60 * 1000, // 1 hour
  maxConcurrency: 2,
};

function abortReason(signal: AbortSignal): Error {
  return signal.reason instanceof Error ? signal.reason : new Error('Aborted');
}

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(abortReason(signal));
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal ? abortReason(signal) : new Error('Aborted'));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

export class RateLimiter implements RequestBudget {
  private burstQueue: number[] = [];
  private sustainedQueue: number[] = [];
  private activeRequests = 0;
  private waiters: Array<() => void> = [];
  private config: RateLimitConfig;
  private now: () => number;

  constructor(config: Partial<RateLimitConfig> = {}, now: () => number = Date.now) {
    this.config = { ...DEFAULT_RATE_LIMIT, ...config };
    if (this.config.maxConcurrency < 1) {
      throw new Error(`maxConcurrency must be >= 1 (got ${this.config.maxConcurrency})`);
    }
    this.now = now;
  }

  get inFlight(): number {
    return this.activeRequests;
  }

  get queued(): number {
    return this.waiters.length;
  }

  async acquire(signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) throw abortReason(signal);

    await this.waitForSlot(signal);

    // Slot is held from here on; give it back if the window wait is aborted
    try {
      await this.waitForWindow(signal);
    } catch (error) {
      this.release();
      throw error;
    }

    const now = this.now();
    this.burstQueue.push(now);
    this.sustainedQueue.push(now);
  }

  release(): void {
    const next = this.waiters.shift();
    if (next) {
      // Hand the slot straight to the next waiter
      next();
      return;
    }
    if (this.activeRequests > 0) this.activeRequests--;
  }

  private waitForSlot(signal?: AbortSignal): Promise<void> {
    if (this.activeRequests < this.config.maxConcurrency) {
      this.activeRequests++;
      return Promise.resolve();
    }

    return new Promise((resolve, reject) => {
      const grant = () => {
        signal?.removeEventListener('abort', onAbort);
        resolve();
      };
      const onAbort = () => {
        this.waiters = this.waiters.filter((w) => w !== grant);
        reject(signal ? abortReason(signal) : new Error('Aborted'));
      };
      this.waiters.push(grant);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }

  private async waitForWindow(signal?: AbortSignal): Promise<void> {
    for (;;) {
      const now = this.now();

      // Clean old entries
      this.burstQueue = this.burstQueue.filter((t) => now - t < this.config.burstWindowMs);
      this.sustainedQueue = this.sustainedQueue.filter((t) => now - t < this.config.sustainedWindowMs);

      if (this.burstQueue.length >= this.config.burst) {
        const oldest = Math.min(...this.burstQueue);
        await sleep(this.config.burstWindowMs - (now - oldest) + 100, signal);
        continue;
      }

      if (this.sustainedQueue.length >= this.config.sustained) {
        const oldest = Math.min(...this.sustainedQueue);
        await sleep(this.config.sustainedWindowMs - (now - oldest) + 100, signal);
        continue;
      }

      return;
    }
  }
}

export { sleep };
