/**
 * Pipeline Orchestrator
 *
 * league URL -> seasons -> matches -> access params -> odds payloads -> records
 *
 * Each stage hands the next one a plain value, so a run can also start from
 * a stored season (runSeason) or a stored match list (runMatches).
 *
 * Failure policy:
 * - A match's failure is recorded in the summary; other matches carry on
 * - A StructuralChangeError stops all remaining work and fails the run
 * - Cancellation (external AbortSignal) stops new work; what was already
 *   written stays written
 */

import {
  LeagueDiscovery,
  LocateMode,
  Logger,
  MatchRef,
  Season,
} from '../../adapters/DataSourceAdapter';
import { LeagueResolver } from '../../adapters/LeagueResolver';
import { LocateOptions, MatchLocator } from '../../adapters/MatchLocator';
import { MatchParamsExtractor, isNoOdds } from '../../adapters/MatchParamsExtractor';
import { OddsFetcher, buildMarketSelectors, detectClockSkew } from '../../adapters/OddsFetcher';
import { ErrorClass, StructuralChangeError, errMsg, errorClassOf } from '../../lib/errors';
import { normalize } from '../../lib/odds-normalizer';
import { OddsSink } from '../storage/sink';

export type PipelineState =
  | 'Idle'
  | 'Resolving'
  | 'Locating'
  | 'Extracting'
  | 'Fetching'
  | 'Normalizing'
  | 'Done'
  | 'Failed';

const STAGE_ORDER: PipelineState[] = ['Idle', 'Resolving', 'Locating', 'Extracting', 'Fetching', 'Normalizing'];

export interface StateTransition {
  from: PipelineState;
  to: PipelineState;
  at: Date;
}

export interface MatchFailure {
  matchId: string;
  errorClass: ErrorClass;
  message: string;
  /** Set when only one market of the match failed */
  market?: { bettingTypeId: number; scopeId: number };
}

export interface RunSummary {
  state: 'Done' | 'Failed';
  succeeded: number;
  skipped: Array<{ matchId: string; reason: string }>;
  failed: MatchFailure[];
  snapshots: number;
  historyEntries: number;
  qualityIssues: number;
  clockSkewWarnings: number;
  needsReextraction: string[];
  /** Why the run stopped early, if it did */
  abortReason: string | null;
  transitions: StateTransition[];
}

export interface PipelineComponents {
  resolver: Pick<LeagueResolver, 'resolve'>;
  locator: Pick<MatchLocator, 'locate'>;
  extractor: Pick<MatchParamsExtractor, 'extractParams'>;
  fetcher: Pick<OddsFetcher, 'fetchOdds'>;
  sink: OddsSink;
  logger?: Logger;
  now?: () => Date;
}

export interface PipelineOptions {
  mode?: LocateMode;
  /** Season ids to process ("current" for the current season); default: every season with data for the mode */
  seasons?: string[];
  bettingTypeIds?: number[];
  scopeIds?: number[];
  startPage?: number;
  maxPages?: number;
  maxConcurrentMatches?: number;
  maxConcurrentMarkets?: number;
  clockSkewToleranceSeconds?: number;
  signal?: AbortSignal;
}

type ResolvedOptions = Required<Omit<PipelineOptions, 'seasons' | 'signal' | 'maxPages'>> &
  Pick<PipelineOptions, 'seasons' | 'signal' | 'maxPages'>;

const DEFAULT_OPTIONS: Omit<ResolvedOptions, 'seasons' | 'signal' | 'maxPages'> = {
  mode: 'results',
  bettingTypeIds: [1],
  scopeIds: [2],
  startPage: 1,
  maxConcurrentMatches: 4,
  maxConcurrentMarkets: 2,
  clockSkewToleranceSeconds: 300,
};

/**
 * Select the seasons a run covers. Explicit ids win; otherwise every season
 * that has data for the mode.
 */
export function selectSeasons(seasons: Season[], mode: LocateMode, ids?: string[]): Season[] {
  if (ids && ids.length > 0) {
    return seasons.filter((s) => ids.includes(s.seasonId));
  }
  return seasons.filter((s) => (mode === 'results' ? s.hasResults : s.hasFixtures));
}

/** Run items through `worker` with at most `limit` in flight, stopping early once `signal` aborts */
async function forEachBounded<T>(
  items: T[],
  limit: number,
  signal: AbortSignal,
  worker: (item: T) => Promise<void>,
): Promise<void> {
  let index = 0;
  const lanes = Array.from({ length: Math.max(1, Math.min(limit, items.length)) }, async () => {
    while (index < items.length && !signal.aborted) {
      const item = items[index++];
      await worker(item);
    }
  });
  await Promise.all(lanes);
}

class PipelineRun {
  private state: PipelineState = 'Idle';
  private controller = new AbortController();
  private reextract = new Set<string>();
  private onExternalAbort = () => this.abort('cancelled');
  readonly summary: RunSummary = {
    state: 'Done',
    succeeded: 0,
    skipped: [],
    failed: [],
    snapshots: 0,
    historyEntries: 0,
    qualityIssues: 0,
    clockSkewWarnings: 0,
    needsReextraction: [],
    abortReason: null,
    transitions: [],
  };

  constructor(
    private components: PipelineComponents,
    private options: ResolvedOptions,
    private logger: Logger,
    private now: () => Date,
  ) {
    if (options.signal?.aborted) {
      this.abort('cancelled');
    } else {
      options.signal?.addEventListener('abort', this.onExternalAbort, { once: true });
    }
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  /** Stages only move forward; a match entering an earlier stage than the run's leaves the state alone */
  enter(next: PipelineState): void {
    if (STAGE_ORDER.indexOf(next) <= STAGE_ORDER.indexOf(this.state)) return;
    this.transition(next);
  }

  private transition(next: PipelineState): void {
    this.summary.transitions.push({ from: this.state, to: next, at: this.now() });
    this.logger.log(`[PIPELINE] ${this.state} -> ${next}`);
    this.state = next;
  }

  abort(reason: string): void {
    if (this.summary.abortReason === null) this.summary.abortReason = reason;
    this.controller.abort(new Error(reason));
  }

  /** A structural error anywhere ends the run; everything else stays with its match */
  recordFailure(matchId: string, error: unknown, market?: MatchFailure['market']): void {
    // Requests cut short by an abort are not failures of their own
    if (this.signal.aborted && !(error instanceof StructuralChangeError)) return;

    this.summary.failed.push({ matchId, errorClass: errorClassOf(error), message: errMsg(error), market });
    if (error instanceof StructuralChangeError) {
      this.logger.error(`[PIPELINE] ❌ Structural change, stopping: ${error.message}`);
      this.abort(`structural-change: ${error.message}`);
    }
  }

  async resolve(leagueUrl: string): Promise<LeagueDiscovery | null> {
    this.enter('Resolving');
    try {
      const discovery = await this.components.resolver.resolve(leagueUrl, this.signal);
      await this.components.sink.saveLeague(discovery);
      return discovery;
    } catch (error) {
      this.recordFailure('', error);
      this.abort(`resolve-failed: ${errMsg(error)}`);
      return null;
    }
  }

  async locate(season: Season, leagueId: string): Promise<MatchRef[]> {
    this.enter('Locating');
    const locateOptions: LocateOptions = {
      startPage: this.options.startPage,
      maxPages: this.options.maxPages,
      signal: this.signal,
    };

    const matches: MatchRef[] = [];
    try {
      for await (const match of this.components.locator.locate(season, this.options.mode, locateOptions)) {
        matches.push(match);
      }
    } catch (error) {
      this.recordFailure('', error);
      if (!(error instanceof StructuralChangeError)) {
        this.logger.warn(`[PIPELINE] ⚠️  Locating ${season.seasonId} stopped after ${matches.length} matches`);
      }
    }

    if (matches.length > 0) {
      await this.components.sink.saveMatches(leagueId, matches);
    }
    return matches;
  }

  async processMatches(matches: MatchRef[]): Promise<void> {
    await forEachBounded(matches, this.options.maxConcurrentMatches, this.signal, (match) =>
      this.processMatch(match),
    );
  }

  private async processMatch(match: MatchRef): Promise<void> {
    try {
      this.enter('Extracting');
      const params = await this.components.extractor.extractParams(match.matchUrl, this.signal);
      if (isNoOdds(params)) {
        this.summary.skipped.push({ matchId: match.matchId, reason: params.reason });
        return;
      }

      this.enter('Fetching');
      const selectors = buildMarketSelectors(match.matchId, this.options.bettingTypeIds, this.options.scopeIds);
      let fetched = 0;
      let failed = 0;
      let produced = 0;
      let unavailableReason: string | null = null;

      for await (const result of this.components.fetcher.fetchOdds(params, selectors, {
        signal: this.signal,
        maxConcurrentMarkets: this.options.maxConcurrentMarkets,
      })) {
        const market = { bettingTypeId: result.selector.bettingTypeId, scopeId: result.selector.scopeId };

        if (result.kind === 'skipped') continue;
        if (result.kind === 'failed') {
          failed++;
          this.recordFailure(match.matchId, result.error, market);
          continue;
        }

        this.enter('Normalizing');
        fetched++;
        const normalized = normalize(result.payload, result.selector, params.hasStarted);

        this.summary.qualityIssues += normalized.issues.length;
        for (const issue of normalized.issues) {
          this.logger.warn(`[PIPELINE] ⚠️  ${match.matchId}: ${issue.message}`);
        }
        if (normalized.unavailable) {
          if (unavailableReason === null) unavailableReason = normalized.unavailable.reason;
          this.logger.log(`[PIPELINE] ${match.matchId} bt=${market.bettingTypeId} sc=${market.scopeId}: ${normalized.unavailable.reason}`);
        }

        const skew = detectClockSkew(normalized.history, params.hasStarted, this.now(), this.options.clockSkewToleranceSeconds);
        if (skew) {
          this.summary.clockSkewWarnings++;
          this.reextract.add(match.matchId);
          this.logger.warn(`[PIPELINE] ⚠️  ${skew.message}`);
        }

        await this.components.sink.saveOdds({ snapshots: normalized.snapshots, history: normalized.history });
        this.summary.snapshots += normalized.snapshots.length;
        this.summary.historyEntries += normalized.history.length;
        produced += normalized.snapshots.length + normalized.history.length;
      }

      if (produced > 0) {
        this.summary.succeeded++;
      } else if (failed === 0 && !this.signal.aborted) {
        const reason = unavailableReason ?? (fetched > 0 ? 'no-records' : 'market-not-offered');
        this.summary.skipped.push({ matchId: match.matchId, reason });
      }
    } catch (error) {
      this.logger.error(`[PIPELINE] ❌ ${match.matchId}: ${errMsg(error)}`);
      this.recordFailure(match.matchId, error);
    }
  }

  finish(): RunSummary {
    this.options.signal?.removeEventListener('abort', this.onExternalAbort);
    this.summary.needsReextraction = [...this.reextract];
    this.summary.state = this.summary.abortReason === null ? 'Done' : 'Failed';
    this.transition(this.summary.state);

    const s = this.summary;
    const marker = s.state === 'Done' ? '✅' : '❌';
    this.logger.log(
      `[PIPELINE] ${marker} ${s.state}: ${s.succeeded} succeeded, ${s.skipped.length} skipped, ${s.failed.length} failed, ` +
        `${s.snapshots} snapshots, ${s.historyEntries} history, ${s.qualityIssues} quality issues`,
    );
    return this.summary;
  }
}

export class PipelineOrchestrator {
  private logger: Logger;
  private now: () => Date;

  constructor(
    private components: PipelineComponents,
    private defaults: PipelineOptions = {},
  ) {
    this.logger = components.logger ?? console;
    this.now = components.now ?? (() => new Date());
  }

  private start(options: PipelineOptions): PipelineRun {
    const merged: ResolvedOptions = { ...DEFAULT_OPTIONS, ...stripUndefined(this.defaults), ...stripUndefined(options) };
    return new PipelineRun(this.components, merged, this.logger, this.now);
  }

  async run(leagueUrl: string, options: PipelineOptions = {}): Promise<RunSummary> {
    const run = this.start(options);
    const mode = options.mode ?? this.defaults.mode ?? DEFAULT_OPTIONS.mode;

    const discovery = await run.resolve(leagueUrl);
    if (!discovery) return run.finish();

    const seasons = selectSeasons(discovery.seasons, mode, options.seasons ?? this.defaults.seasons);
    if (seasons.length === 0) {
      this.logger.warn(`[PIPELINE] ⚠️  No seasons to process for ${leagueUrl} (${mode})`);
      return run.finish();
    }

    for (const season of seasons) {
      if (run.signal.aborted) break;
      this.logger.log(`[PIPELINE] Season ${season.seasonId} (${mode})`);
      const matches = await run.locate(season, discovery.league.leagueId);
      await run.processMatches(matches);
    }

    return run.finish();
  }

  /** Resume from a stored season */
  async runSeason(season: Season, mode: LocateMode, options: PipelineOptions = {}): Promise<RunSummary> {
    const run = this.start({ ...options, mode });
    const matches = await run.locate(season, season.leagueId);
    await run.processMatches(matches);
    return run.finish();
  }

  /** Resume from a stored match list */
  async runMatches(matches: MatchRef[], options: PipelineOptions = {}): Promise<RunSummary> {
    const run = this.start(options);
    await run.processMatches(matches);
    return run.finish();
  }
}

function stripUndefined(options: PipelineOptions): PipelineOptions {
  const out: PipelineOptions = {};
  for (const [key, value] of Object.entries(options)) {
    if (value !== undefined) Object.assign(out, { [key]: value });
  }
  return out;
}
