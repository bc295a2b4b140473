#!/usr/bin/env node

/**
 * Odds Ingestion CLI
 *
 * Command: npm run ingest -- <command> [options]
 *
 * Every stage can be run on its own from the previous stage's output, or the
 * whole chain at once with `run`. Records go to stdout as JSON; progress logs
 * go to stderr.
 */

import { Command, InvalidArgumentError } from 'commander';
import { AdapterFactory } from './adapters/AdapterFactory';
import { LocateMode, Logger, MatchRef, Season } from './adapters/DataSourceAdapter';
import { isNoOdds } from './adapters/MatchParamsExtractor';
import { buildMarketSelectors } from './adapters/OddsFetcher';
import { errMsg } from './lib/errors';
import { normalize } from './lib/odds-normalizer';

const stderrLogger: Logger = {
  log: (...args) => console.error(...args),
  warn: (...args) => console.warn(...args),
  error: (...args) => console.error(...args),
};

type GlobalOptions = {
  config: string;
  fixtures?: string;
};

interface MarketOptions {
  betTypes?: number[];
  scopes?: number[];
}

interface LocateCliOptions {
  seasonId: string;
  leagueId: string;
  mode: LocateMode;
  startPage?: number;
  maxPages?: number;
}

interface RunCliOptions extends MarketOptions {
  seasons?: string[];
  mode: LocateMode;
  maxPages?: number;
  dryRun?: boolean;
}

function parseIdList(value: string): number[] {
  const ids = value.split(',').map((v) => Number(v.trim()));
  if (ids.some((n) => !Number.isInteger(n) || n <= 0)) {
    throw new InvalidArgumentError(`Expected comma-separated positive ids, got "${value}"`);
  }
  return ids;
}

function parseNameList(value: string): string[] {
  return value
    .split(',')
    .map((v) => v.trim())
    .filter(Boolean);
}

function parsePositiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n <= 0) {
    throw new InvalidArgumentError(`Expected a positive integer, got "${value}"`);
  }
  return n;
}

function parseMode(value: string): LocateMode {
  if (value === 'results' || value === 'fixtures') return value;
  throw new InvalidArgumentError('Mode must be "results" or "fixtures"');
}

function print(value: unknown): void {
  process.stdout.write(`${JSON.stringify(value, null, 2)}\n`);
}

const program = new Command();

program
  .name('odds-ingest')
  .description('League -> seasons -> matches -> odds extraction pipeline')
  .option('-c, --config <path>', 'path to datasources.yml', 'datasources.yml')
  .option('--fixtures <dir>', 'serve pages from a local directory instead of the network');

function factory(dryRun = false): AdapterFactory {
  const globals = program.opts<GlobalOptions>();
  return new AdapterFactory(globals.config, { fixturesDir: globals.fixtures, dryRun, logger: stderrLogger });
}

/** Abort the run on Ctrl-C; a second Ctrl-C exits immediately */
function interruptSignal(): AbortSignal {
  const controller = new AbortController();
  process.once('SIGINT', () => {
    stderrLogger.warn('[CLI] ⚠️  Interrupted, finishing in-flight requests...');
    controller.abort(new Error('interrupted'));
    process.once('SIGINT', () => process.exit(130));
  });
  return controller.signal;
}

program
  .command('resolve')
  .description('discover league identifiers and seasons')
  .argument('<leagueUrl>', 'league landing page URL')
  .action(async (leagueUrl: string) => {
    print(await factory().createResolver().resolve(leagueUrl, interruptSignal()));
  });

program
  .command('locate')
  .description('list the matches of one season')
  .argument('<seasonUrl>', 'season URL (canonical league URL for the current season)')
  .requiredOption('--season-id <id>', 'season id ("current" or e.g. 2022-2023)')
  .requiredOption('--league-id <id>', 'league id from `resolve`')
  .option('--mode <mode>', 'results | fixtures', parseMode, 'results')
  .option('--start-page <n>', 'first archive page', parsePositiveInt)
  .option('--max-pages <n>', 'stop after this many archive pages', parsePositiveInt)
  .action(async (seasonUrl: string, opts: LocateCliOptions) => {
    const season: Season = {
      seasonId: opts.seasonId,
      leagueId: opts.leagueId,
      isCurrent: opts.seasonId === 'current',
      hasResults: true,
      hasFixtures: opts.mode === 'fixtures',
      seasonUrl,
      startYear: null,
    };

    const matches: MatchRef[] = [];
    const locator = factory().createLocator();
    for await (const match of locator.locate(season, opts.mode, {
      startPage: opts.startPage,
      maxPages: opts.maxPages,
      signal: interruptSignal(),
    })) {
      matches.push(match);
    }
    print(matches);
  });

program
  .command('extract')
  .description('extract odds access parameters from a match page')
  .argument('<matchUrl>', 'match page URL')
  .action(async (matchUrl: string) => {
    print(await factory().createExtractor().extractParams(matchUrl, interruptSignal()));
  });

program
  .command('fetch')
  .description('extract, fetch and normalize the odds of one match')
  .argument('<matchUrl>', 'match page URL')
  .option('--bet-types <ids>', 'betting type ids, comma-separated', parseIdList)
  .option('--scopes <ids>', 'scope ids, comma-separated', parseIdList)
  .action(async (matchUrl: string, opts: MarketOptions) => {
    const adapters = factory();
    const signal = interruptSignal();
    const params = await adapters.createExtractor().extractParams(matchUrl, signal);
    if (isNoOdds(params)) {
      print(params);
      return;
    }

    const { pipeline } = adapters.config;
    const selectors = buildMarketSelectors(
      params.matchId,
      opts.betTypes ?? pipeline.defaultBettingTypes,
      opts.scopes ?? pipeline.defaultScopes,
    );

    const markets: unknown[] = [];
    for await (const result of adapters.createOddsFetcher().fetchOdds(params, selectors, { signal })) {
      if (result.kind === 'fetched') {
        const normalized = normalize(result.payload, result.selector, params.hasStarted);
        markets.push({
          selector: result.selector,
          unavailable: normalized.unavailable,
          issues: normalized.issues.map((i) => i.message),
          snapshots: normalized.snapshots,
          history: normalized.history,
        });
      } else if (result.kind === 'failed') {
        markets.push({ selector: result.selector, error: errMsg(result.error) });
      } else {
        markets.push({ selector: result.selector, skipped: result.reason });
      }
    }
    print({ params, markets });
  });

program
  .command('run')
  .description('run the whole pipeline for a league')
  .argument('<leagueUrl>', 'league landing page URL')
  .option('--seasons <ids>', 'season ids to process, comma-separated ("current" for the current season)', parseNameList)
  .option('--mode <mode>', 'results | fixtures', parseMode, 'results')
  .option('--bet-types <ids>', 'betting type ids, comma-separated', parseIdList)
  .option('--scopes <ids>', 'scope ids, comma-separated', parseIdList)
  .option('--max-pages <n>', 'archive pages per season', parsePositiveInt)
  .option('--dry-run', 'keep records in memory instead of writing to Postgres')
  .action(async (leagueUrl: string, opts: RunCliOptions) => {
    const adapters = factory(opts.dryRun === true);
    const sink = adapters.createSink();

    try {
      const summary = await adapters.createPipeline(sink).run(leagueUrl, {
        mode: opts.mode,
        seasons: opts.seasons,
        bettingTypeIds: opts.betTypes,
        scopeIds: opts.scopes,
        maxPages: opts.maxPages,
        signal: interruptSignal(),
      });
      print(summary);
      if (summary.state === 'Failed') process.exitCode = 1;
    } finally {
      await sink.close();
    }
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(`[CLI] ❌ ${errMsg(error)}`);
  process.exitCode = 1;
});
