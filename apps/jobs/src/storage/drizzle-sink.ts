/**
 * Postgres sink (drizzle-orm over a pg Pool)
 *
 * Snapshots, leagues, seasons and matches are upserted on their natural
 * keys. History rows are append-only and keyed on what was observed
 * (series, observedAt, occurrence), so a later fetch that adds an older
 * observation never shifts the rows already stored.
 */

import { Pool } from 'pg';
import { sql } from 'drizzle-orm';
import { drizzle, NodePgDatabase } from 'drizzle-orm/node-postgres';
import { LeagueDiscovery, Logger, MatchRef } from '../../adapters/DataSourceAdapter';
import * as schema from './schema';
import { OddsBatch, OddsSink } from './sink';

const BATCH_SIZE = 500;

function chunk<T>(items: T[], size: number): T[][] {
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size));
  }
  return chunks;
}

export class DrizzleSink implements OddsSink {
  readonly name = 'postgres';
  private pool: Pool;
  private db: NodePgDatabase<typeof schema>;
  private logger: Logger;

  constructor(config: { connectionString: string; logger?: Logger }) {
    this.pool = new Pool({ connectionString: config.connectionString, max: 5 });
    this.db = drizzle(this.pool, { schema });
    this.logger = config.logger ?? console;
  }

  async saveLeague(discovery: LeagueDiscovery): Promise<void> {
    const { league, seasons } = discovery;

    await this.db
      .insert(schema.leagues)
      .values({
        leagueId: league.leagueId,
        sportId: league.sportId,
        countryId: league.countryId,
        leagueUrl: league.leagueUrl,
        sportSlug: league.sportSlug,
        countrySlug: league.countrySlug,
        leagueSlug: league.leagueSlug,
        isActive: league.isActive,
      })
      .onConflictDoUpdate({
        target: schema.leagues.leagueId,
        set: {
          sportId: league.sportId,
          countryId: league.countryId,
          leagueUrl: league.leagueUrl,
          sportSlug: league.sportSlug,
          countrySlug: league.countrySlug,
          leagueSlug: league.leagueSlug,
          isActive: league.isActive,
          updatedAt: sql`now()`,
        },
      });

    if (seasons.length > 0) {
      await this.db
        .insert(schema.seasons)
        .values(
          seasons.map((s) => ({
            leagueId: league.leagueId,
            seasonId: s.seasonId,
            isCurrent: s.isCurrent,
            hasResults: s.hasResults,
            hasFixtures: s.hasFixtures,
            seasonUrl: s.seasonUrl,
            startYear: s.startYear,
          })),
        )
        .onConflictDoUpdate({
          target: [schema.seasons.leagueId, schema.seasons.seasonId],
          set: {
            isCurrent: sql`excluded.is_current`,
            hasResults: sql`excluded.has_results`,
            hasFixtures: sql`excluded.has_fixtures`,
            seasonUrl: sql`excluded.season_url`,
            startYear: sql`excluded.start_year`,
            updatedAt: sql`now()`,
          },
        });
    }

    this.logger.log(`[SINK] ✅ League ${league.leagueId} with ${seasons.length} seasons`);
  }

  async saveMatches(leagueId: string, matches: MatchRef[]): Promise<void> {
    for (const rows of chunk(matches, BATCH_SIZE)) {
      await this.db
        .insert(schema.matches)
        .values(
          rows.map((m) => ({
            matchId: m.matchId,
            leagueId,
            seasonId: m.seasonId,
            matchUrl: m.matchUrl,
            kickoffAt: m.kickoffTimestamp,
            status: m.status,
            homeTeam: m.homeTeam,
            awayTeam: m.awayTeam,
          })),
        )
        .onConflictDoUpdate({
          target: schema.matches.matchId,
          set: {
            seasonId: sql`excluded.season_id`,
            matchUrl: sql`excluded.match_url`,
            kickoffAt: sql`excluded.kickoff_at`,
            status: sql`excluded.status`,
            homeTeam: sql`excluded.home_team`,
            awayTeam: sql`excluded.away_team`,
            updatedAt: sql`now()`,
          },
        });
    }
  }

  async saveOdds(batch: OddsBatch): Promise<void> {
    for (const rows of chunk(batch.snapshots, BATCH_SIZE)) {
      await this.db
        .insert(schema.oddsSnapshots)
        .values(rows)
        .onConflictDoUpdate({
          target: [
            schema.oddsSnapshots.matchId,
            schema.oddsSnapshots.bettingTypeId,
            schema.oddsSnapshots.scopeId,
            schema.oddsSnapshots.handicapValue,
            schema.oddsSnapshots.outcomeIndex,
            schema.oddsSnapshots.bookmakerId,
            schema.oddsSnapshots.direction,
          ],
          set: {
            handicapTypeId: sql`excluded.handicap_type_id`,
            mixedParameterId: sql`excluded.mixed_parameter_id`,
            outcomeKey: sql`excluded.outcome_key`,
            outcomeName: sql`excluded.outcome_name`,
            bettingTypeName: sql`excluded.betting_type_name`,
            scopeName: sql`excluded.scope_name`,
            handicapTypeName: sql`excluded.handicap_type_name`,
            bookmakerName: sql`excluded.bookmaker_name`,
            currentOdds: sql`excluded.current_odds`,
            openingOdds: sql`excluded.opening_odds`,
            currentVolume: sql`excluded.current_volume`,
            openingVolume: sql`excluded.opening_volume`,
            movement: sql`excluded.movement`,
            lastChangedAt: sql`excluded.last_changed_at`,
            openingChangedAt: sql`excluded.opening_changed_at`,
            isActive: sql`excluded.is_active`,
            isExchangeActiveByOutcome: sql`excluded.is_exchange_active_by_outcome`,
            hasStarted: sql`excluded.has_started`,
            updatedAt: sql`now()`,
          },
        });
    }

    for (const rows of chunk(batch.history, BATCH_SIZE)) {
      await this.db.insert(schema.oddsHistory).values(rows).onConflictDoNothing();
    }

    if (batch.snapshots.length > 0 || batch.history.length > 0) {
      this.logger.log(`[SINK] Stored ${batch.snapshots.length} snapshots, ${batch.history.length} history rows`);
    }
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}
