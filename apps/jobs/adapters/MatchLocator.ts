/**
 * Match Locator
 *
 * Season + mode -> lazy stream of MatchRef.
 *
 * results:  season results page -> archive AJAX endpoint -> paged JSON rows
 * fixtures: season page -> JSON-LD SportsEvent blocks
 *
 * Pages are pulled one at a time as the consumer iterates, so a caller that
 * stops early never requests the rest. `startPage` resumes a partial walk.
 */

import { z } from 'zod';
import { LocateMode, Logger, MatchRef, MatchStatus, PageFetcher, Season } from './DataSourceAdapter';
import { StructuralChangeError } from '../lib/errors';
import { absoluteUrl, scriptBodies } from '../lib/html';
import { PayloadDecoder } from '../lib/payload-decoder';

const ARCHIVE_PATTERN = /\/ajax-sport-country-tournament-archive_\/(\d+)\/([^/"'\s]+)\/([^/"'\s]+)\//;
const MATCH_ID_PATTERN = /-([a-zA-Z0-9]+)\/?$/;

const SOURCE_STATUS: Record<number, MatchStatus> = {
  0: 'scheduled',
  1: 'live',
  2: 'live',
  3: 'finished',
  4: 'postponed',
  5: 'cancelled',
};

const SCHEMA_ORG_STATUS: Record<string, MatchStatus> = {
  EventScheduled: 'scheduled',
  EventRescheduled: 'scheduled',
  EventPostponed: 'postponed',
  EventCancelled: 'cancelled',
};

const IdSchema = z.union([z.number(), z.string()]);

const ArchiveRowSchema = z.object({
  encodeEventId: z.string().optional(),
  url: z.string().optional(),
  'date-start-timestamp': IdSchema.nullish(),
  'status-id': IdSchema.nullish(),
  'home-name': z.string().nullish(),
  'away-name': z.string().nullish(),
});

const ArchivePageSchema = z.object({
  s: IdSchema,
  d: z
    .object({
      rows: z.array(z.unknown()).nullish(),
      pagination: z.object({ pageCount: IdSchema.nullish() }).passthrough().nullish(),
      page: IdSchema.nullish(),
    })
    .passthrough()
    .nullish(),
});

export interface MatchLocatorOptions {
  fetcher: PageFetcher;
  decoder: PayloadDecoder;
  baseUrl: string;
  /** Timezone offset segment the archive endpoint expects */
  resultsTimezone?: string;
  logger?: Logger;
}

export interface LocateOptions {
  /** 1-based archive page to start from */
  startPage?: number;
  maxPages?: number;
  signal?: AbortSignal;
}

export function mapSourceStatus(statusId: number | null, mode: LocateMode): MatchStatus {
  if (statusId !== null && SOURCE_STATUS[statusId]) return SOURCE_STATUS[statusId];
  return mode === 'fixtures' ? 'scheduled' : 'finished';
}

export function matchIdFromUrl(url: string): string | null {
  return MATCH_ID_PATTERN.exec(url)?.[1] ?? null;
}

function toInt(value: string | number | null | undefined): number | null {
  if (value === null || value === undefined || value === '') return null;
  const n = Number(value);
  return Number.isFinite(n) ? Math.trunc(n) : null;
}

function withTrailingSlash(url: string): string {
  return url.endsWith('/') ? url : `${url}/`;
}

export class MatchLocator {
  private fetcher: PageFetcher;
  private decoder: PayloadDecoder;
  private baseUrl: string;
  private resultsTimezone: string;
  private logger: Logger;

  constructor(options: MatchLocatorOptions) {
    this.fetcher = options.fetcher;
    this.decoder = options.decoder;
    this.baseUrl = options.baseUrl;
    this.resultsTimezone = options.resultsTimezone ?? '0';
    this.logger = options.logger ?? console;
  }

  async *locate(season: Season, mode: LocateMode, options: LocateOptions = {}): AsyncGenerator<MatchRef> {
    const seen = new Set<string>();
    const source = mode === 'results' ? this.archiveMatches(season, options) : this.fixtureMatches(season, options);

    for await (const match of source) {
      if (seen.has(match.matchId)) continue;
      seen.add(match.matchId);
      yield match;
    }

    this.logger.log(`[LOCATOR] ✅ ${season.seasonId} (${mode}): ${seen.size} matches`);
  }

  private async *archiveMatches(season: Season, options: LocateOptions): AsyncGenerator<MatchRef> {
    const pageUrl = `${withTrailingSlash(season.seasonUrl)}results/`;
    const html = await this.fetcher.fetchText(pageUrl, { signal: options.signal });

    const archive = ARCHIVE_PATTERN.exec(html);
    if (!archive) {
      throw new StructuralChangeError('Results page has no archive endpoint', pageUrl);
    }
    const archiveBase = absoluteUrl(archive[0], this.baseUrl);

    const startPage = Math.max(1, options.startPage ?? 1);
    const lastAllowed = options.maxPages ? startPage + options.maxPages - 1 : Number.POSITIVE_INFINITY;
    let pageCount: number | null = null;

    for (let page = startPage; page <= lastAllowed && (pageCount === null || page <= pageCount); page++) {
      if (options.signal?.aborted) return;

      const url = `${archiveBase}${page}/${this.resultsTimezone}/?_=`;
      this.logger.log(`[LOCATOR] Archive page ${page}${pageCount ? `/${pageCount}` : ''}: ${season.seasonId}`);

      const body = await this.fetcher.fetchText(url, {
        signal: options.signal,
        headers: { Referer: pageUrl, 'X-Requested-With': 'XMLHttpRequest' },
      });

      const parsed = ArchivePageSchema.safeParse(this.decoder.decode(body, url));
      if (!parsed.success) {
        throw new StructuralChangeError('Archive page is not a {s, d} envelope', url);
      }
      if (toInt(parsed.data.s) !== 1) {
        throw new StructuralChangeError(`Archive page status ${parsed.data.s}`, url);
      }

      const data = parsed.data.d;
      pageCount = toInt(data?.pagination?.pageCount) ?? page;
      const rows = data?.rows ?? [];

      for (const raw of rows) {
        const match = this.archiveRow(raw, season);
        if (match) yield match;
      }

      if (rows.length === 0) return;
    }
  }

  private archiveRow(raw: unknown, season: Season): MatchRef | null {
    const row = ArchiveRowSchema.safeParse(raw);
    if (!row.success || !row.data.url) {
      this.logger.warn(`[LOCATOR] ⚠️  Skipping archive row without url in ${season.seasonId}`);
      return null;
    }

    const matchUrl = absoluteUrl(row.data.url, this.baseUrl);
    const matchId = row.data.encodeEventId || matchIdFromUrl(row.data.url);
    if (!matchId) {
      this.logger.warn(`[LOCATOR] ⚠️  No match id in ${matchUrl}`);
      return null;
    }

    const kickoff = toInt(row.data['date-start-timestamp']);
    return {
      matchId,
      matchUrl,
      seasonId: season.seasonId,
      kickoffTimestamp: kickoff && kickoff > 0 ? new Date(kickoff * 1000) : null,
      status: mapSourceStatus(toInt(row.data['status-id']), 'results'),
      homeTeam: row.data['home-name'] ?? null,
      awayTeam: row.data['away-name'] ?? null,
    };
  }

  private async *fixtureMatches(season: Season, options: LocateOptions): AsyncGenerator<MatchRef> {
    const pageUrl = withTrailingSlash(season.seasonUrl);
    const html = await this.fetcher.fetchText(pageUrl, { signal: options.signal });

    const blocks = scriptBodies(html, 'application/ld+json');
    if (blocks.length === 0) {
      throw new StructuralChangeError('Fixtures page has no JSON-LD blocks', pageUrl);
    }

    for (const block of blocks) {
      let data: unknown;
      try {
        data = JSON.parse(block.trim());
      } catch {
        this.logger.warn(`[LOCATOR] ⚠️  Unparsable JSON-LD block on ${pageUrl}`);
        continue;
      }

      for (const event of sportsEvents(data)) {
        const match = this.fixtureEvent(event, season);
        if (match) yield match;
      }
    }
  }

  private fixtureEvent(event: SportsEventLd, season: Season): MatchRef | null {
    const matchId = matchIdFromUrl(event.url);
    if (!matchId) {
      this.logger.warn(`[LOCATOR] ⚠️  No match id in ${event.url}`);
      return null;
    }

    const teams = (event.name ?? '').split(' - ');
    const kickoff = event.startDate ? new Date(event.startDate) : null;
    const statusKey = event.eventStatus?.replace(/^https?:\/\/schema\.org\//, '') ?? '';

    return {
      matchId,
      matchUrl: absoluteUrl(event.url, this.baseUrl),
      seasonId: season.seasonId,
      kickoffTimestamp: kickoff && !Number.isNaN(kickoff.getTime()) ? kickoff : null,
      status: SCHEMA_ORG_STATUS[statusKey] ?? 'scheduled',
      homeTeam: teams.length >= 2 ? teams[0].trim() : null,
      awayTeam: teams.length >= 2 ? teams[1].trim() : null,
    };
  }
}

const SportsEventSchema = z.object({
  '@type': z.union([z.string(), z.array(z.string())]),
  url: z.string(),
  name: z.string().optional(),
  startDate: z.string().optional(),
  eventStatus: z.string().optional(),
});

type SportsEventLd = z.infer<typeof SportsEventSchema>;

/** SportsEvent objects in a JSON-LD document (single object, array or @graph) */
function sportsEvents(data: unknown): SportsEventLd[] {
  const nodes: unknown[] = Array.isArray(data) ? data : [data];
  const events: SportsEventLd[] = [];

  for (const node of nodes) {
    if (typeof node === 'object' && node !== null && '@graph' in node && Array.isArray(node['@graph'])) {
      events.push(...sportsEvents(node['@graph']));
      continue;
    }
    const parsed = SportsEventSchema.safeParse(node);
    if (!parsed.success) continue;
    const types = Array.isArray(parsed.data['@type']) ? parsed.data['@type'] : [parsed.data['@type']];
    if (types.includes('SportsEvent')) events.push(parsed.data);
  }

  return events;
}
