/**
 * Odds Source Contract
 *
 * Record types shared by every pipeline stage, and the collaborator
 * interfaces the stages are written against (page fetching, request budget,
 * logging). Each stage's output is a plain serializable value so a run can
 * resume from any stage.
 */

export type MatchStatus = 'scheduled' | 'live' | 'finished' | 'postponed' | 'cancelled';
export type LocateMode = 'results' | 'fixtures';
export type Direction = 'back' | 'lay';
export type Movement = 'up' | 'down' | 'none';

export interface LeagueIdentity {
  sportId: string;
  countryId: string;
  leagueId: string;
  leagueUrl: string;
  isActive: boolean;
  sportSlug: string;
  countrySlug: string;
  leagueSlug: string;
}

export interface Season {
  seasonId: string;
  leagueId: string;
  isCurrent: boolean;
  hasResults: boolean;
  hasFixtures: boolean;
  seasonUrl: string;
  startYear: number | null;
}

export interface LeagueDiscovery {
  league: LeagueIdentity;
  seasons: Season[];
}

export interface MatchRef {
  matchId: string;
  matchUrl: string;
  seasonId: string;
  kickoffTimestamp: Date | null;
  status: MatchStatus;
  homeTeam: string | null;
  awayTeam: string | null;
}

export interface MatchAccessParams {
  matchId: string;
  matchUrl: string;
  sportId: string;
  /** Percent-encoded, exactly as served by the page */
  accessToken: string;
  protocolVersion: string;
  hasStarted: boolean;
  extractedAt: Date;
  /** bettingTypeId -> scopeIds the page offers; empty when the page did not say */
  availableMarkets: Record<string, number[]>;
}

export interface NoOddsAvailable {
  kind: 'no-odds';
  matchUrl: string;
  reason: string;
}

export interface MarketSelector {
  matchId: string;
  bettingTypeId: number;
  scopeId: number;
}

export interface OddsSnapshot {
  matchId: string;
  bettingTypeId: number;
  scopeId: number;
  handicapTypeId: number;
  handicapValue: number;
  mixedParameterId: number;
  outcomeIndex: number;
  outcomeKey: string | null;
  outcomeName: string;
  bettingTypeName: string;
  scopeName: string;
  handicapTypeName: string;
  bookmakerId: string;
  bookmakerName: string;
  direction: Direction;
  currentOdds: number;
  openingOdds: number | null;
  currentVolume: number | null;
  openingVolume: number | null;
  movement: Movement;
  lastChangedAt: Date | null;
  openingChangedAt: Date | null;
  isActive: boolean;
  isExchangeActiveByOutcome: boolean;
  hasStarted: boolean;
}

export interface OddsHistoryEntry {
  matchId: string;
  bettingTypeId: number;
  scopeId: number;
  outcomeKey: string;
  bookmakerId: string;
  direction: Direction;
  odds: number;
  volume: number | null;
  observedAt: Date;
  /** Position among entries of the same series sharing observedAt; 0 for most */
  occurrence: number;
}

export interface FetchTextOptions {
  headers?: Record<string, string>;
  signal?: AbortSignal;
}

/**
 * Anything that can turn a URL into a response body. The HTTP client, the
 * fixture-backed fetcher and test stubs all implement this.
 */
export interface PageFetcher {
  fetchText(url: string, options?: FetchTextOptions): Promise<string>;
}

/**
 * Shared politeness budget. Acquire a slot before each outbound request,
 * release it when the request settles.
 */
export interface RequestBudget {
  acquire(signal?: AbortSignal): Promise<void>;
  release(): void;
}

export interface Logger {
  log(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
}

export const silentLogger: Logger = {
  log: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
