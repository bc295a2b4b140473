/**
 * Market and Bookmaker Name Lookups
 *
 * Resolves the source's numeric ids (bookmakers, betting types, scopes,
 * handicap types, outcome positions) to display names. The tables live in
 * config/mappings.json.
 */

import mappings from '../config/mappings.json';

interface BettingTypeName {
  name: string;
  shortName: string;
}

const BOOKMAKERS: Record<string, string> = mappings.bookmakers;
const BETTING_TYPES: Record<string, BettingTypeName> = mappings.bettingTypes;
const SCOPES: Record<string, string> = mappings.scopes;
const HANDICAP_TYPES: Record<string, string> = mappings.handicapTypes;
const OUTCOMES: Record<string, string[]> = mappings.outcomes;

export function bookmakerName(bookmakerId: string | number): string {
  return BOOKMAKERS[String(bookmakerId)] ?? `Bookmaker_${bookmakerId}`;
}

export function bettingTypeName(bettingTypeId: number): string {
  return BETTING_TYPES[String(bettingTypeId)]?.name ?? `Unknown_${bettingTypeId}`;
}

export function scopeName(scopeId: number): string {
  return SCOPES[String(scopeId)] ?? `Unknown_${scopeId}`;
}

export function handicapTypeName(handicapTypeId: number): string {
  return HANDICAP_TYPES[String(handicapTypeId)] ?? `Unknown_${handicapTypeId}`;
}

/**
 * Name for an outcome position within a market.
 *
 * Correct score, HT/FT and outright markets have no fixed table; those and
 * any position past the end of a table fall back to `outcome_<n>`.
 */
export function outcomeName(bettingTypeId: number, position: number): string {
  return OUTCOMES[String(bettingTypeId)]?.[position] ?? `outcome_${position}`;
}
