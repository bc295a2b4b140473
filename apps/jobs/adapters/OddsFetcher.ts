/**
 * Odds Fetcher
 *
 * One request per market selector against the match-event endpoint:
 *
 *   /match-event/<version>-<sportId>-<matchId>-<bt>-<sc>-<token>.dat?_=
 *
 * Requests for one match run with bounded concurrency and are yielded in
 * selector order. A failed selector is reported and never stops the others;
 * retries happen below this layer in the HTTP client.
 */

import {
  Logger,
  MarketSelector,
  MatchAccessParams,
  OddsHistoryEntry,
  PageFetcher,
} from './DataSourceAdapter';
import { ClockSkewWarning, errMsg } from '../lib/errors';
import { PayloadDecoder } from '../lib/payload-decoder';

export interface FetchedPayload {
  kind: 'fetched';
  selector: MarketSelector;
  url: string;
  payload: unknown;
}

export interface FetchFailure {
  kind: 'failed';
  selector: MarketSelector;
  url: string;
  error: unknown;
}

export interface FetchSkip {
  kind: 'skipped';
  selector: MarketSelector;
  reason: string;
}

export type FetchResult = FetchedPayload | FetchFailure | FetchSkip;

export interface OddsFetcherOptions {
  fetcher: PageFetcher;
  decoder: PayloadDecoder;
  baseUrl: string;
  maxConcurrentMarkets?: number;
  logger?: Logger;
}

export interface FetchOddsOptions {
  signal?: AbortSignal;
  maxConcurrentMarkets?: number;
}

/** Cartesian product of betting types and scopes for one match */
export function buildMarketSelectors(
  matchId: string,
  bettingTypeIds: number[] = [1],
  scopeIds: number[] = [2],
): MarketSelector[] {
  const selectors: MarketSelector[] = [];
  for (const bettingTypeId of bettingTypeIds) {
    for (const scopeId of scopeIds) {
      selectors.push({ matchId, bettingTypeId, scopeId });
    }
  }
  return selectors;
}

function decodeToken(token: string): string {
  try {
    return decodeURIComponent(token);
  } catch {
    // Not percent-encoded after all
    return token;
  }
}

export function buildOddsUrl(baseUrl: string, params: MatchAccessParams, selector: MarketSelector): string {
  const segments = [
    params.protocolVersion,
    params.sportId,
    selector.matchId,
    selector.bettingTypeId,
    selector.scopeId,
    decodeToken(params.accessToken),
  ];
  return `${baseUrl.replace(/\/+$/, '')}/match-event/${segments.join('-')}.dat?_=`;
}

/** True unless the page listed its markets and this one is not among them */
export function isMarketOffered(params: MatchAccessParams, selector: MarketSelector): boolean {
  if (Object.keys(params.availableMarkets).length === 0) return true;
  return params.availableMarkets[String(selector.bettingTypeId)]?.includes(selector.scopeId) ?? false;
}

/**
 * A match that has not started cannot have odds history from the future.
 * When it does, the started flag (or the clock) is wrong and the access
 * parameters should be extracted again.
 */
export function detectClockSkew(
  history: OddsHistoryEntry[],
  hasStarted: boolean,
  now: Date,
  toleranceSeconds: number = 0,
): ClockSkewWarning | null {
  if (hasStarted || history.length === 0) return null;

  let latest = history[0];
  for (const entry of history) {
    if (entry.observedAt.getTime() > latest.observedAt.getTime()) latest = entry;
  }

  if (latest.observedAt.getTime() > now.getTime() + toleranceSeconds * 1000) {
    return new ClockSkewWarning(latest.matchId, latest.observedAt, now);
  }
  return null;
}

export class OddsFetcher {
  private fetcher: PageFetcher;
  private decoder: PayloadDecoder;
  private baseUrl: string;
  private maxConcurrentMarkets: number;
  private logger: Logger;

  constructor(options: OddsFetcherOptions) {
    this.fetcher = options.fetcher;
    this.decoder = options.decoder;
    this.baseUrl = options.baseUrl;
    this.maxConcurrentMarkets = options.maxConcurrentMarkets ?? 2;
    this.logger = options.logger ?? console;
  }

  async *fetchOdds(
    params: MatchAccessParams,
    selectors: MarketSelector[],
    options: FetchOddsOptions = {},
  ): AsyncGenerator<FetchResult> {
    const limit = Math.max(1, options.maxConcurrentMarkets ?? this.maxConcurrentMarkets);
    const pending: Array<Promise<FetchResult>> = [];
    let next = 0;

    const fill = () => {
      while (next < selectors.length && pending.length < limit && !options.signal?.aborted) {
        pending.push(this.fetchOne(params, selectors[next++], options.signal));
      }
    };

    fill();
    let settled = pending.shift();
    while (settled) {
      const result = await settled;
      fill();
      yield result;
      settled = pending.shift();
    }

    if (next < selectors.length) {
      this.logger.warn(`[FETCH] ⚠️  Aborted with ${selectors.length - next} markets not requested for ${params.matchId}`);
    }
  }

  private async fetchOne(params: MatchAccessParams, selector: MarketSelector, signal?: AbortSignal): Promise<FetchResult> {
    if (!isMarketOffered(params, selector)) {
      return { kind: 'skipped', selector, reason: 'market-not-offered' };
    }

    const url = buildOddsUrl(this.baseUrl, params, selector);
    try {
      const body = await this.fetcher.fetchText(url, {
        signal,
        headers: { Referer: params.matchUrl, 'X-Requested-With': 'XMLHttpRequest' },
      });
      const payload = this.decoder.decode(body, url);
      this.logger.log(`[FETCH] ✅ ${selector.matchId} bt=${selector.bettingTypeId} sc=${selector.scopeId}`);
      return { kind: 'fetched', selector, url, payload };
    } catch (error) {
      this.logger.error(
        `[FETCH] ❌ ${selector.matchId} bt=${selector.bettingTypeId} sc=${selector.scopeId}: ${errMsg(error)}`,
      );
      return { kind: 'failed', selector, url, error };
    }
  }
}
