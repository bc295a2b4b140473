/**
 * Match Parameter Extractor
 *
 * Match page -> everything the odds endpoint needs: sport id, protocol
 * version, started flag and the short-lived access token. Parameters are
 * rebuilt on every call and never cached; the token rotates.
 */

import { z } from 'zod';
import { Logger, MatchAccessParams, NoOddsAvailable, PageFetcher } from './DataSourceAdapter';
import { StructuralChangeError } from '../lib/errors';
import { allScriptText, elementById, extractAttr } from '../lib/html';
import { HeaderTokenExtractor, MatchPageEvidence, TokenExtractor, extractToken } from './token-extractors';

const IdSchema = z.union([z.number(), z.string()]).transform(String);

const EventDataSchema = z
  .object({
    id: IdSchema,
    sportId: IdSchema,
    versionId: IdSchema.optional(),
    isStarted: z.unknown().optional(),
  })
  .passthrough();

const HeaderSchema = z.object({ eventData: z.record(z.string(), z.unknown()) }).passthrough();

const PAGE_VAR_PATTERNS = [
  /var\s+pageVar\s*=\s*'([\s\S]*?)'\s*;/,
  /var\s+pageVar\s*=\s*"([\s\S]*?)"\s*;/,
  /var\s+pageVar\s*=\s*(\{[\s\S]*?\})\s*;/,
];

const DEFAULT_PROTOCOL_VERSION = '1';

export interface MatchParamsExtractorOptions {
  fetcher: PageFetcher;
  tokenExtractors?: TokenExtractor[];
  logger?: Logger;
  now?: () => Date;
}

export function isNoOdds(value: MatchAccessParams | NoOddsAvailable): value is NoOddsAvailable {
  return 'kind' in value && value.kind === 'no-odds';
}

function toStarted(value: unknown): boolean {
  return value === true || value === 1 || value === '1' || value === 'true';
}

export class MatchParamsExtractor {
  private fetcher: PageFetcher;
  private tokenExtractors: TokenExtractor[];
  private logger: Logger;
  private now: () => Date;

  constructor(options: MatchParamsExtractorOptions) {
    this.fetcher = options.fetcher;
    this.tokenExtractors = options.tokenExtractors ?? [new HeaderTokenExtractor()];
    this.logger = options.logger ?? console;
    this.now = options.now ?? (() => new Date());
  }

  async extractParams(matchUrl: string, signal?: AbortSignal): Promise<MatchAccessParams | NoOddsAvailable> {
    const html = await this.fetcher.fetchText(matchUrl, { signal });
    const result = parseMatchPage(html, matchUrl, this.tokenExtractors, this.now());

    if (isNoOdds(result)) {
      this.logger.warn(`[EXTRACT] ⚠️  No odds for ${matchUrl}: ${result.reason}`);
    } else {
      this.logger.log(
        `[EXTRACT] ✅ ${result.matchId}: sport=${result.sportId} v=${result.protocolVersion} started=${result.hasStarted}`,
      );
    }
    return result;
  }
}

export function parseMatchPage(
  html: string,
  matchUrl: string,
  extractors: TokenExtractor[],
  extractedAt: Date,
): MatchAccessParams | NoOddsAvailable {
  const headerTag = elementById(html, 'react-event-header');
  const headerData = headerTag ? extractAttr(headerTag, 'data') : null;
  if (!headerData) {
    throw new StructuralChangeError('Match page has no event header', matchUrl);
  }

  let headerJson: unknown;
  try {
    headerJson = JSON.parse(headerData);
  } catch {
    throw new StructuralChangeError('Event header data is not JSON', matchUrl);
  }

  const header = HeaderSchema.safeParse(headerJson);
  if (!header.success) {
    throw new StructuralChangeError('Event header has no eventData', matchUrl);
  }
  const event = EventDataSchema.safeParse(header.data.eventData);
  if (!event.success) {
    throw new StructuralChangeError('Event header lacks match or sport id', matchUrl);
  }

  const scripts = allScriptText(html);
  const evidence: MatchPageEvidence = { header: header.data.eventData, scripts };
  const found = extractToken(extractors, evidence);
  if (!found) {
    throw new StructuralChangeError('No access token evidence on match page', matchUrl);
  }
  if (found.token === '') {
    return { kind: 'no-odds', matchUrl, reason: 'empty-access-token' };
  }

  return {
    matchId: event.data.id,
    matchUrl,
    sportId: event.data.sportId,
    accessToken: found.token,
    protocolVersion: event.data.versionId ?? DEFAULT_PROTOCOL_VERSION,
    hasStarted: toStarted(event.data.isStarted),
    extractedAt,
    availableMarkets: parseAvailableMarkets(scripts),
  };
}

/**
 * `pageVar.navFiltered`: bettingTypeId -> {scopeId: ...}. An absent or
 * unparsable pageVar yields {} (offer unknown, nothing is filtered).
 */
export function parseAvailableMarkets(scripts: string): Record<string, number[]> {
  for (const pattern of PAGE_VAR_PATTERNS) {
    const m = pattern.exec(scripts);
    if (!m) continue;

    let pageVar: unknown;
    try {
      pageVar = JSON.parse(m[1]);
    } catch {
      continue;
    }
    if (typeof pageVar !== 'object' || pageVar === null || !('navFiltered' in pageVar)) return {};

    const nav = pageVar.navFiltered;
    if (typeof nav !== 'object' || nav === null || Array.isArray(nav)) return {};

    const markets: Record<string, number[]> = {};
    for (const [bettingTypeId, value] of Object.entries(nav)) {
      const scopes: unknown = value;
      const ids = Array.isArray(scopes)
        ? scopes.map(Number)
        : typeof scopes === 'object' && scopes !== null
          ? Object.keys(scopes).map(Number)
          : [];
      markets[bettingTypeId] = ids.filter((n) => Number.isInteger(n));
    }
    return markets;
  }
  return {};
}
