/**
 * Identifier Resolver
 *
 * League landing URL -> LeagueIdentity + seasons (current first, then
 * historical newest first). The current season lives on the canonical league
 * URL; historical seasons live under "<league>-<year>" sibling paths.
 */

import { LeagueDiscovery, LeagueIdentity, Logger, PageFetcher, Season } from './DataSourceAdapter';
import { StructuralChangeError } from '../lib/errors';
import { allScriptText, anchorHrefs, optionValues } from '../lib/html';

export interface LeagueUrlParts {
  origin: string;
  sportSlug: string;
  countrySlug: string;
  leagueSlug: string;
  canonicalUrl: string;
}

function escapeRegex(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Split a league URL into its slugs. Accepts the canonical URL or its
 * /results/ page, with or without a trailing slash.
 */
export function parseLeagueUrl(leagueUrl: string): LeagueUrlParts {
  const url = new URL(leagueUrl);
  const segments = url.pathname.split('/').filter(Boolean);
  if (segments[segments.length - 1] === 'results') segments.pop();

  if (segments.length < 3) {
    throw new Error(`League URL must look like <host>/<sport>/<country>/<league>/ (got ${leagueUrl})`);
  }

  const [sportSlug, countrySlug, leagueSlug] = segments.slice(-3);
  const origin = url.origin.toLowerCase();
  return {
    origin,
    sportSlug,
    countrySlug,
    leagueSlug,
    canonicalUrl: `${origin}/${sportSlug}/${countrySlug}/${leagueSlug}/`,
  };
}

/**
 * True when two league URLs point at different pages once scheme, host case,
 * trailing slash and a trailing /results/ segment are ignored.
 */
export function isStructuralUrlChange(previousUrl: string, nextUrl: string): boolean {
  const key = (u: string) => {
    const parts = parseLeagueUrl(u);
    return `${parts.origin.replace(/^https?:\/\//, '')}/${parts.sportSlug}/${parts.countrySlug}/${parts.leagueSlug}`;
  };
  return key(previousUrl) !== key(nextUrl);
}

export class LeagueResolver {
  constructor(
    private fetcher: PageFetcher,
    private logger: Logger = console,
  ) {}

  async resolve(leagueUrl: string, signal?: AbortSignal): Promise<LeagueDiscovery> {
    const parts = parseLeagueUrl(leagueUrl);
    const resultsUrl = `${parts.canonicalUrl}results/`;

    this.logger.log(`[RESOLVER] Discovering league: ${parts.canonicalUrl}`);
    const html = await this.fetcher.fetchText(resultsUrl, { signal });

    const discovery = parseLeaguePage(html, parts, resultsUrl);
    this.logger.log(
      `[RESOLVER] ✅ ${parts.leagueSlug}: sport=${discovery.league.sportId} league=${discovery.league.leagueId} ` +
        `seasons=${discovery.seasons.length}`,
    );
    return discovery;
  }
}

/**
 * Parse a league results page. Exported separately so stored pages can be
 * re-parsed without fetching.
 */
export function parseLeaguePage(html: string, parts: LeagueUrlParts, pageUrl: string): LeagueDiscovery {
  const scripts = allScriptText(html);
  const archive = /\/ajax-sport-country-tournament-archive_\/(\d+)\/([^/"']+)\//.exec(html);

  const sportId = /"sid"\s*:\s*"?(\d+)/.exec(scripts)?.[1] ?? archive?.[1];
  if (!sportId) {
    throw new StructuralChangeError('League page has no sport id', pageUrl);
  }

  const league: LeagueIdentity = {
    sportId,
    countryId: parts.countrySlug,
    leagueId: extractLeagueId(scripts) ?? archive?.[2] ?? parts.leagueSlug,
    leagueUrl: parts.canonicalUrl,
    isActive: true,
    sportSlug: parts.sportSlug,
    countrySlug: parts.countrySlug,
    leagueSlug: parts.leagueSlug,
  };

  const seasons = [currentSeason(html, parts, league.leagueId), ...historicalSeasons(html, scripts, parts, league.leagueId)];

  return { league, seasons };
}

function extractLeagueId(scripts: string): string | null {
  const outrights = /var\s+pageOutrightsVar\s*=\s*'(\{[\s\S]*?\})'/.exec(scripts);
  if (outrights) {
    try {
      const data: unknown = JSON.parse(outrights[1]);
      if (typeof data === 'object' && data !== null && 'id' in data && typeof data.id === 'string' && data.id) {
        return data.id;
      }
    } catch {
      // Fall through to the looser pattern below
    }
  }
  return /"id"\s*:\s*"([A-Za-z0-9]+)"/.exec(scripts)?.[1] ?? null;
}

function currentSeason(html: string, parts: LeagueUrlParts, leagueId: string): Season {
  const leaguePath = `/${parts.sportSlug}/${parts.countrySlug}/${parts.leagueSlug}/`;
  const hasFixtures = anchorHrefs(html).some((href) => {
    const path = href.startsWith('http') ? new URL(href).pathname : href;
    return path === leaguePath || path.startsWith(`${leaguePath}fixtures/`);
  });

  return {
    seasonId: 'current',
    leagueId,
    isCurrent: true,
    hasResults: true,
    hasFixtures,
    seasonUrl: parts.canonicalUrl,
    startYear: null,
  };
}

function historicalSeasons(html: string, scripts: string, parts: LeagueUrlParts, leagueId: string): Season[] {
  const pattern = new RegExp(
    `/${escapeRegex(parts.countrySlug)}/${escapeRegex(parts.leagueSlug)}-(\\d{4}(?:-\\d{4})?)/`,
    'g',
  );

  const years = new Set<string>();
  for (const source of [anchorHrefs(html).join('\n'), optionValues(html).join('\n'), scripts]) {
    let m: RegExpExecArray | null;
    while ((m = pattern.exec(source)) !== null) years.add(m[1]);
  }

  return [...years]
    .map((year) => ({
      seasonId: year,
      leagueId,
      isCurrent: false,
      hasResults: true,
      hasFixtures: false,
      seasonUrl: `${parts.origin}/${parts.sportSlug}/${parts.countrySlug}/${parts.leagueSlug}-${year}/`,
      startYear: parseInt(year.slice(0, 4), 10),
    }))
    .sort((a, b) => b.startYear - a.startYear || b.seasonId.localeCompare(a.seasonId));
}
