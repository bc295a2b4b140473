import {
  pgTable,
  serial,
  text,
  integer,
  boolean,
  timestamp,
  doublePrecision,
  uniqueIndex,
  index,
} from 'drizzle-orm/pg-core';

export const leagues = pgTable('leagues', {
  leagueId: text('league_id').primaryKey(),
  sportId: text('sport_id').notNull(),
  countryId: text('country_id').notNull(),
  leagueUrl: text('league_url').notNull(),
  sportSlug: text('sport_slug').notNull(),
  countrySlug: text('country_slug').notNull(),
  leagueSlug: text('league_slug').notNull(),
  isActive: boolean('is_active').notNull().default(true),
  updatedAt: timestamp('updated_at', { withTimezone: true }).defaultNow().notNull(),
});

export const seasons = pgTable(
  'seasons',
  {
    id: serial('id').primaryKey(),
    leagueId: text('league_id')
      .notNull()
      .references(() => leagues.leagueId),
    seasonId: text('season_id').notNull(),
    isCurrent: boolean('is_current').notNull(),
    hasResults: boolean('has_results').notNull(),
    hasFixtures: boolean('has_fixtures').notNull(),
    seasonUrl: text('season_url').notNull(),
    startYear: integer('start_year'),
    updatedAt: timestamp('updated_at', { withTimezone: true }).defaultNow().notNull(),
  },
  (table) => ({
    leagueSeasonIdx: uniqueIndex('seasons_league_season_idx').on(table.leagueId, table.seasonId),
  }),
);

export const matches = pgTable(
  'matches',
  {
    matchId: text('match_id').primaryKey(),
    leagueId: text('league_id').notNull(),
    seasonId: text('season_id').notNull(),
    matchUrl: text('match_url').notNull(),
    kickoffAt: timestamp('kickoff_at', { withTimezone: true }),
    status: text('status').notNull(),
    homeTeam: text('home_team'),
    awayTeam: text('away_team'),
    updatedAt: timestamp('updated_at', { withTimezone: true }).defaultNow().notNull(),
  },
  (table) => ({
    seasonIdx: index('matches_league_season_idx').on(table.leagueId, table.seasonId),
  }),
);

export const oddsSnapshots = pgTable(
  'odds_snapshots',
  {
    id: serial('id').primaryKey(),
    matchId: text('match_id').notNull(),
    bettingTypeId: integer('betting_type_id').notNull(),
    scopeId: integer('scope_id').notNull(),
    handicapTypeId: integer('handicap_type_id').notNull(),
    handicapValue: doublePrecision('handicap_value').notNull(),
    mixedParameterId: integer('mixed_parameter_id').notNull(),
    outcomeIndex: integer('outcome_index').notNull(),
    outcomeKey: text('outcome_key'),
    outcomeName: text('outcome_name').notNull(),
    bettingTypeName: text('betting_type_name').notNull(),
    scopeName: text('scope_name').notNull(),
    handicapTypeName: text('handicap_type_name').notNull(),
    bookmakerId: text('bookmaker_id').notNull(),
    bookmakerName: text('bookmaker_name').notNull(),
    direction: text('direction').notNull(),
    currentOdds: doublePrecision('current_odds').notNull(),
    openingOdds: doublePrecision('opening_odds'),
    currentVolume: doublePrecision('current_volume'),
    openingVolume: doublePrecision('opening_volume'),
    movement: text('movement').notNull(),
    lastChangedAt: timestamp('last_changed_at', { withTimezone: true }),
    openingChangedAt: timestamp('opening_changed_at', { withTimezone: true }),
    isActive: boolean('is_active').notNull(),
    isExchangeActiveByOutcome: boolean('is_exchange_active_by_outcome').notNull(),
    hasStarted: boolean('has_started').notNull(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).defaultNow().notNull(),
  },
  (table) => ({
    naturalKey: uniqueIndex('odds_snapshots_natural_key').on(
      table.matchId,
      table.bettingTypeId,
      table.scopeId,
      table.handicapValue,
      table.outcomeIndex,
      table.bookmakerId,
      table.direction,
    ),
  }),
);

export const oddsHistory = pgTable(
  'odds_history',
  {
    id: serial('id').primaryKey(),
    matchId: text('match_id').notNull(),
    bettingTypeId: integer('betting_type_id').notNull(),
    scopeId: integer('scope_id').notNull(),
    outcomeKey: text('outcome_key').notNull(),
    bookmakerId: text('bookmaker_id').notNull(),
    direction: text('direction').notNull(),
    odds: doublePrecision('odds').notNull(),
    volume: doublePrecision('volume'),
    observedAt: timestamp('observed_at', { withTimezone: true }).notNull(),
    occurrence: integer('occurrence').notNull(),
  },
  (table) => ({
    naturalKey: uniqueIndex('odds_history_natural_key').on(
      table.matchId,
      table.bettingTypeId,
      table.scopeId,
      table.outcomeKey,
      table.bookmakerId,
      table.direction,
      table.observedAt,
      table.occurrence,
    ),
  }),
);
