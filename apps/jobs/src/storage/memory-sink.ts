/**
 * In-memory sink for dry runs and tests.
 */

import {
  LeagueIdentity,
  MatchRef,
  OddsHistoryEntry,
  OddsSnapshot,
  Season,
  LeagueDiscovery,
} from '../../adapters/DataSourceAdapter';
import { historyRowKey, snapshotKey } from '../../lib/odds-normalizer';
import { OddsBatch, OddsSink } from './sink';

export class MemorySink implements OddsSink {
  readonly name = 'memory';

  readonly leagues = new Map<string, LeagueIdentity>();
  readonly seasons = new Map<string, Season>();
  readonly matches = new Map<string, MatchRef & { leagueId: string }>();
  readonly snapshots = new Map<string, OddsSnapshot>();
  readonly history = new Map<string, OddsHistoryEntry>();
  closed = false;

  async saveLeague(discovery: LeagueDiscovery): Promise<void> {
    this.leagues.set(discovery.league.leagueId, discovery.league);
    for (const season of discovery.seasons) {
      this.seasons.set(`${season.leagueId}|${season.seasonId}`, season);
    }
  }

  async saveMatches(leagueId: string, matches: MatchRef[]): Promise<void> {
    for (const match of matches) {
      this.matches.set(match.matchId, { ...match, leagueId });
    }
  }

  async saveOdds(batch: OddsBatch): Promise<void> {
    for (const snapshot of batch.snapshots) {
      this.snapshots.set(snapshotKey(snapshot), snapshot);
    }
    for (const entry of batch.history) {
      const key = historyRowKey(entry);
      if (!this.history.has(key)) this.history.set(key, entry);
    }
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}
