/**
 * Output sink contract. Every write is an upsert on the record's natural
 * key (history: natural key + observedAt + occurrence), so replaying a run is harmless.
 */

import { LeagueDiscovery, MatchRef, OddsHistoryEntry, OddsSnapshot } from '../../adapters/DataSourceAdapter';

export interface OddsBatch {
  snapshots: OddsSnapshot[];
  history: OddsHistoryEntry[];
}

export interface OddsSink {
  readonly name: string;
  saveLeague(discovery: LeagueDiscovery): Promise<void>;
  saveMatches(leagueId: string, matches: MatchRef[]): Promise<void>;
  saveOdds(batch: OddsBatch): Promise<void>;
  close(): Promise<void>;
}
