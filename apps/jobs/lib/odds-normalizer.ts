/**
 * Odds Payload Normalizer
 *
 * Flattens one match-event odds payload into snapshot and history records.
 *
 *   d.oddsdata.back|lay["E-<bt>-<sc>-<ht>-<hv>-<mp>"] -> market block whose
 *   odds / movement / openingOdd / openingChangeTime / volume / openingVolume /
 *   changeTime / act / actEx dictionaries are co-indexed by bookmaker id and
 *   outcome position ("0", "1", "2" keys or plain arrays).
 *
 *   d.oddsdata.history.back|lay[outcomeKey][bookmakerId] -> [[odds, volume, ts], ...]
 *
 * Outcome positions (0/1/2) and history outcome keys are separate id spaces;
 * the market's `outcomeId` map is the only link between them.
 *
 * Pure: no clock, no I/O. The same payload always yields the same records.
 */

import { z } from 'zod';
import {
  Direction,
  MarketSelector,
  Movement,
  OddsHistoryEntry,
  OddsSnapshot,
} from '../adapters/DataSourceAdapter';
import { DataQualityError } from './errors';
import { bettingTypeName, bookmakerName, handicapTypeName, outcomeName, scopeName } from './market-mappings';

export const MIN_DECIMAL_ODDS = 1.0;
export const MAX_DECIMAL_ODDS = 1000;

const DIRECTIONS: Direction[] = ['back', 'lay'];
const MARKET_KEY_PATTERN = /^E-(\d+)-(\d+)-(\d+)-(-?\d+(?:\.\d+)?)-(\d+)$/;

type Dict = Record<string, unknown>;

function isDict(value: unknown): value is Dict {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Dictionaries may arrive as arrays (index = key) or be missing entirely */
function toDict(value: unknown): unknown {
  if (value === undefined || value === null) return {};
  if (Array.isArray(value)) {
    return Object.fromEntries(value.map((v, i) => [String(i), v]));
  }
  return value;
}

const DictSchema = z.preprocess(toDict, z.record(z.string(), z.unknown()));
const IdSchema = z.union([z.number(), z.string()]);

const EnvelopeSchema = z.object({
  s: IdSchema,
  d: z.unknown(),
});

const DataSchema = z.object({
  bt: IdSchema.nullish(),
  sc: IdSchema.nullish(),
  nav: z.unknown().optional(),
  oddsdata: z.object({
    back: DictSchema,
    lay: DictSchema,
    history: DictSchema,
  }),
  'time-base': IdSchema.nullish(),
  encodeventId: IdSchema.nullish(),
  refresh: IdSchema.nullish(),
});

const MarketBlockSchema = z.object({
  odds: DictSchema,
  outcomeId: DictSchema,
  movement: DictSchema,
  openingOdd: DictSchema,
  openingChangeTime: DictSchema,
  volume: DictSchema,
  openingVolume: DictSchema,
  changeTime: DictSchema,
  act: z.unknown(),
  actEx: z.unknown(),
  history: DictSchema,
});

type MarketBlock = z.infer<typeof MarketBlockSchema>;

export interface MarketKey {
  bettingTypeId: number;
  scopeId: number;
  handicapTypeId: number;
  handicapValue: number;
  mixedParameterId: number;
}

export interface PayloadMeta {
  bettingTypeId: number | null;
  scopeId: number | null;
  timeBase: number | null;
  refreshSeconds: number | null;
  encodedEventId: string | null;
}

export interface NormalizeResult {
  snapshots: OddsSnapshot[];
  history: OddsHistoryEntry[];
  issues: DataQualityError[];
  /** Set when the source had no odds to give (status != 1, nothing opened) */
  unavailable: { reason: string } | null;
  meta: PayloadMeta;
}

export function parseMarketKey(key: string): MarketKey | null {
  const match = MARKET_KEY_PATTERN.exec(key);
  if (!match) return null;
  return {
    bettingTypeId: Number(match[1]),
    scopeId: Number(match[2]),
    handicapTypeId: Number(match[3]),
    handicapValue: Number(match[4]),
    mixedParameterId: Number(match[5]),
  };
}

function toNumber(value: unknown): number | null {
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value === 'string' && value.trim() !== '') {
    const n = Number(value);
    return Number.isFinite(n) ? n : null;
  }
  return null;
}

function toId(value: unknown): number | null {
  const n = toNumber(value);
  return n === null ? null : Math.trunc(n);
}

function toDate(value: unknown): Date | null {
  const seconds = toNumber(value);
  return seconds === null || seconds <= 0 ? null : new Date(seconds * 1000);
}

function toBool(value: unknown): boolean | null {
  if (typeof value === 'boolean') return value;
  if (value === 1 || value === '1' || value === 'true') return true;
  if (value === 0 || value === '0' || value === 'false') return false;
  return null;
}

function toMovement(value: unknown): Movement {
  if (typeof value === 'number') {
    if (value > 0) return 'up';
    if (value < 0) return 'down';
    return 'none';
  }
  if (typeof value === 'string') {
    const v = value.trim().toLowerCase();
    if (v === 'up' || v === 'u') return 'up';
    if (v === 'down' || v === 'd') return 'down';
  }
  return 'none';
}

/**
 * Value for (bookmaker, position) in a per-bookmaker dictionary. A bookmaker
 * entry may itself be a position dictionary / array or a single scalar that
 * applies to every position.
 */
function cell(dict: Dict, bookmakerId: string, position: string): unknown {
  const entry = dict[bookmakerId];
  if (entry === undefined || entry === null) return undefined;
  if (Array.isArray(entry) || isDict(entry)) {
    const positions = toDict(entry);
    return isDict(positions) ? positions[position] : undefined;
  }
  return entry;
}

function flag(container: unknown, bookmakerId: string, position: string, whenMissing: boolean): boolean {
  if (container === undefined || container === null) return whenMissing;
  const dict = toDict(container);
  if (!isDict(dict)) return whenMissing;
  return toBool(cell(dict, bookmakerId, position)) ?? false;
}

function inOddsRange(odds: number): boolean {
  return odds >= MIN_DECIMAL_ODDS && odds <= MAX_DECIMAL_ODDS;
}

export function snapshotKey(s: OddsSnapshot): string {
  return [s.matchId, s.bettingTypeId, s.scopeId, s.handicapValue, s.outcomeIndex, s.bookmakerId, s.direction].join('|');
}

export function historyKey(h: OddsHistoryEntry): string {
  return [h.matchId, h.bettingTypeId, h.scopeId, h.outcomeKey, h.bookmakerId, h.direction].join('|');
}

/** Identity of one stored observation: same series, same time, same repeat */
export function historyRowKey(h: OddsHistoryEntry): string {
  return [historyKey(h), h.observedAt.getTime(), h.occurrence].join('|');
}

interface HistoryGroup {
  bettingTypeId: number;
  scopeId: number;
  direction: Direction;
  outcomeKey: string;
  bookmakerId: string;
  tuples: unknown;
  path: string;
}

class PayloadNormalizer {
  private snapshots: OddsSnapshot[] = [];
  private issues: DataQualityError[] = [];
  private seenSnapshots = new Set<string>();
  private missingOutcomes = new Set<string>();
  private historyGroups = new Map<string, HistoryGroup>();

  constructor(
    private selector: MarketSelector,
    private hasStarted: boolean,
  ) {}

  run(payload: unknown): NormalizeResult {
    const meta: PayloadMeta = {
      bettingTypeId: null,
      scopeId: null,
      timeBase: null,
      refreshSeconds: null,
      encodedEventId: null,
    };

    const envelope = EnvelopeSchema.safeParse(payload);
    if (!envelope.success) {
      this.issue('Payload has no status code', '$');
      return this.result(meta, { reason: 'malformed-payload' });
    }

    const status = toId(envelope.data.s);
    if (status !== 1) {
      return this.result(meta, { reason: `status-${envelope.data.s}` });
    }

    const data = DataSchema.safeParse(envelope.data.d);
    if (!data.success) {
      this.issue(`Payload data is malformed: ${data.error.issues[0]?.message ?? 'unknown'}`, '$.d');
      return this.result(meta, { reason: 'malformed-payload' });
    }

    const d = data.data;
    meta.bettingTypeId = toId(d.bt);
    meta.scopeId = toId(d.sc);
    meta.timeBase = toNumber(d['time-base']);
    meta.refreshSeconds = toNumber(d.refresh);
    meta.encodedEventId = d.encodeventId === null || d.encodeventId === undefined ? null : String(d.encodeventId);

    this.collectHistory(d.oddsdata.history, '$.d.oddsdata.history', this.selector.bettingTypeId, this.selector.scopeId, null);

    let marketCount = 0;
    for (const direction of DIRECTIONS) {
      for (const [marketKey, block] of Object.entries(d.oddsdata[direction])) {
        marketCount++;
        this.market(direction, marketKey, block);
      }
    }

    const history = this.decodeHistory();

    const unavailable = marketCount === 0 && history.length === 0 ? { reason: 'no-markets' } : null;
    return this.result(meta, unavailable, history);
  }

  private result(
    meta: PayloadMeta,
    unavailable: { reason: string } | null,
    history: OddsHistoryEntry[] = [],
  ): NormalizeResult {
    return { snapshots: this.snapshots, history, issues: this.issues, unavailable, meta };
  }

  private issue(message: string, path: string): void {
    this.issues.push(new DataQualityError(message, path));
  }

  private market(direction: Direction, marketKey: string, rawBlock: unknown): void {
    const path = `$.d.oddsdata.${direction}["${marketKey}"]`;
    const key = parseMarketKey(marketKey);
    if (!key) {
      this.issue('Unrecognised market key', path);
      return;
    }

    const parsed = MarketBlockSchema.safeParse(rawBlock);
    if (!parsed.success) {
      this.issue(`Market block is malformed: ${parsed.error.issues[0]?.message ?? 'unknown'}`, path);
      return;
    }
    const block = parsed.data;

    for (const [bookmakerId, positionsRaw] of Object.entries(block.odds)) {
      const positions = toDict(positionsRaw);
      if (!isDict(positions)) {
        this.issue('Bookmaker odds are not keyed by outcome position', `${path}.odds["${bookmakerId}"]`);
        continue;
      }
      for (const [position, rawOdds] of Object.entries(positions)) {
        this.snapshot(direction, key, block, bookmakerId, position, rawOdds, path);
      }
    }

    // Per-market history blocks are keyed outcomeKey -> bookmaker
    this.collectHistory({ [direction]: block.history }, `${path}.history`, key.bettingTypeId, key.scopeId, direction);
  }

  private snapshot(
    direction: Direction,
    key: MarketKey,
    block: MarketBlock,
    bookmakerId: string,
    position: string,
    rawOdds: unknown,
    path: string,
  ): void {
    const cellPath = `${path}.odds["${bookmakerId}"]["${position}"]`;
    const outcomeIndex = Number(position);
    if (!/^\d+$/.test(position)) {
      this.issue('Outcome position is not an index', cellPath);
      return;
    }

    const currentOdds = toNumber(rawOdds);
    if (currentOdds === null) {
      this.issue(`Odds value ${JSON.stringify(rawOdds)} is not numeric`, cellPath);
      return;
    }
    if (!inOddsRange(currentOdds)) {
      this.issue(`Odds ${currentOdds} outside [${MIN_DECIMAL_ODDS}, ${MAX_DECIMAL_ODDS}]`, cellPath);
      return;
    }

    const rawOutcomeKey = block.outcomeId[position];
    const outcomeKey = rawOutcomeKey === undefined || rawOutcomeKey === null ? null : String(rawOutcomeKey);
    if (outcomeKey === null && !this.missingOutcomes.has(`${path}|${position}`)) {
      this.missingOutcomes.add(`${path}|${position}`);
      this.issue(`No outcomeId entry for position ${position}`, `${path}.outcomeId`);
    }

    const snapshot: OddsSnapshot = {
      matchId: this.selector.matchId,
      bettingTypeId: key.bettingTypeId,
      scopeId: key.scopeId,
      handicapTypeId: key.handicapTypeId,
      handicapValue: key.handicapValue,
      mixedParameterId: key.mixedParameterId,
      outcomeIndex,
      outcomeKey,
      outcomeName: outcomeName(key.bettingTypeId, outcomeIndex),
      bettingTypeName: bettingTypeName(key.bettingTypeId),
      scopeName: scopeName(key.scopeId),
      handicapTypeName: handicapTypeName(key.handicapTypeId),
      bookmakerId,
      bookmakerName: bookmakerName(bookmakerId),
      direction,
      currentOdds,
      openingOdds: toNumber(cell(block.openingOdd, bookmakerId, position)),
      currentVolume: toNumber(cell(block.volume, bookmakerId, position)),
      openingVolume: toNumber(cell(block.openingVolume, bookmakerId, position)),
      movement: toMovement(cell(block.movement, bookmakerId, position)),
      lastChangedAt: toDate(cell(block.changeTime, bookmakerId, position)),
      openingChangedAt: toDate(cell(block.openingChangeTime, bookmakerId, position)),
      isActive: flag(block.act, bookmakerId, position, true),
      isExchangeActiveByOutcome: flag(block.actEx, bookmakerId, position, false),
      hasStarted: this.hasStarted,
    };

    const naturalKey = snapshotKey(snapshot);
    if (this.seenSnapshots.has(naturalKey)) {
      this.issue(`Duplicate record for ${naturalKey}`, cellPath);
      return;
    }
    this.seenSnapshots.add(naturalKey);
    this.snapshots.push(snapshot);
  }

  private collectHistory(
    history: Dict,
    path: string,
    bettingTypeId: number,
    scopeId: number,
    onlyDirection: Direction | null,
  ): void {
    for (const direction of DIRECTIONS) {
      if (onlyDirection && direction !== onlyDirection) continue;
      const byOutcome = toDict(history[direction]);
      if (!isDict(byOutcome)) {
        this.issue('History direction block is not a dictionary', `${path}.${direction}`);
        continue;
      }
      for (const [outcomeKey, byBookmakerRaw] of Object.entries(byOutcome)) {
        const byBookmaker = toDict(byBookmakerRaw);
        if (!isDict(byBookmaker)) {
          this.issue('History outcome block is not a dictionary', `${path}.${direction}["${outcomeKey}"]`);
          continue;
        }
        for (const [bookmakerId, tuples] of Object.entries(byBookmaker)) {
          const groupKey = [bettingTypeId, scopeId, direction, outcomeKey, bookmakerId].join('|');
          // A series already taken from the payload-level block wins
          if (this.historyGroups.has(groupKey)) continue;
          this.historyGroups.set(groupKey, {
            bettingTypeId,
            scopeId,
            direction,
            outcomeKey,
            bookmakerId,
            tuples,
            path: `${path}.${direction}["${outcomeKey}"]["${bookmakerId}"]`,
          });
        }
      }
    }
  }

  private decodeHistory(): OddsHistoryEntry[] {
    const entries: OddsHistoryEntry[] = [];

    for (const group of this.historyGroups.values()) {
      if (!Array.isArray(group.tuples)) {
        this.issue('History sequence is not an array', group.path);
        continue;
      }

      const decoded: Array<{ odds: number; volume: number | null; ts: number }> = [];
      group.tuples.forEach((tuple: unknown, i: number) => {
        const tuplePath = `${group.path}[${i}]`;
        if (!Array.isArray(tuple) || tuple.length < 3) {
          this.issue('History entry is not [odds, volume, timestamp]', tuplePath);
          return;
        }
        const odds = toNumber(tuple[0]);
        const ts = toNumber(tuple[2]);
        if (odds === null || ts === null) {
          this.issue('History entry has non-numeric odds or timestamp', tuplePath);
          return;
        }
        if (!inOddsRange(odds)) {
          this.issue(`Odds ${odds} outside [${MIN_DECIMAL_ODDS}, ${MAX_DECIMAL_ODDS}]`, tuplePath);
          return;
        }
        decoded.push({ odds, volume: toNumber(tuple[1]), ts });
      });

      // Array.prototype.sort is stable: equal timestamps keep source order
      decoded.sort((a, b) => a.ts - b.ts);

      let occurrence = 0;
      decoded.forEach((entry, i) => {
        occurrence = i > 0 && decoded[i - 1].ts === entry.ts ? occurrence + 1 : 0;
        entries.push({
          matchId: this.selector.matchId,
          bettingTypeId: group.bettingTypeId,
          scopeId: group.scopeId,
          outcomeKey: group.outcomeKey,
          bookmakerId: group.bookmakerId,
          direction: group.direction,
          odds: entry.odds,
          volume: entry.volume,
          observedAt: new Date(entry.ts * 1000),
          occurrence,
        });
      });
    }

    return entries;
  }
}

/**
 * Normalize one raw odds payload fetched for `selector`.
 *
 * `hasStarted` comes from the match access parameters and is copied onto
 * every snapshot; the payload alone cannot tell a closing line from a live one.
 */
export function normalize(payload: unknown, selector: MarketSelector, hasStarted: boolean): NormalizeResult {
  return new PayloadNormalizer(selector, hasStarted).run(payload);
}
