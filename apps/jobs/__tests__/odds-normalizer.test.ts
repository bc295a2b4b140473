// Unit tests for the odds payload normalizer

import { MarketSelector } from '../adapters/DataSourceAdapter';
import { DataQualityError } from '../lib/errors';
import { normalize, parseMarketKey, snapshotKey } from '../lib/odds-normalizer';

const selector: MarketSelector = { matchId: 'm1', bettingTypeId: 1, scopeId: 2 };
const MARKET = 'E-1-2-0-0-0';
const MARKET_PATH = `$.d.oddsdata.back["${MARKET}"]`;

function envelope(oddsdata: Record<string, unknown>) {
  return {
    s: 1,
    d: {
      bt: 1,
      sc: 2,
      oddsdata: { back: {}, lay: {}, history: { back: {}, lay: {} }, ...oddsdata },
      'time-base': 1700000000,
      encodeventId: 'm1',
      refresh: 20,
    },
  };
}

function backMarket(block: Record<string, unknown>, key: string = MARKET) {
  return envelope({ back: { [key]: { outcomeId: { '0': 'o-home', '1': 'o-draw', '2': 'o-away' }, ...block } } });
}

describe('Odds normalizer', () => {
  describe('Market keys', () => {
    test('parses plain keys', () => {
      expect(parseMarketKey('E-1-2-0-0-0')).toEqual({
        bettingTypeId: 1,
        scopeId: 2,
        handicapTypeId: 0,
        handicapValue: 0,
        mixedParameterId: 0,
      });
    });

    test('parses negative fractional handicaps', () => {
      expect(parseMarketKey('E-5-2-1--0.25-0')?.handicapValue).toBe(-0.25);
      expect(parseMarketKey('E-2-2-0-2.5-0')?.handicapValue).toBe(2.5);
    });

    test('rejects anything else', () => {
      expect(parseMarketKey('E-1-2-0')).toBeNull();
      expect(parseMarketKey('X-1-2-0-0-0')).toBeNull();
    });
  });

  describe('Single bookmaker 1X2', () => {
    const payload = backMarket({
      odds: { '16': { '0': 1.8, '1': 3.5, '2': 4.2 } },
      movement: { '16': { '0': 'up', '1': 'down' } },
      openingOdd: { '16': { '0': 1.9, '1': 3.4, '2': 4.0 } },
      openingChangeTime: { '16': { '0': 1699990000 } },
      changeTime: { '16': { '0': 1700000000, '1': 1700000000, '2': 1700000000 } },
    });

    test('one snapshot per outcome with zipped fields', () => {
      const result = normalize(payload, selector, false);

      expect(result.issues).toEqual([]);
      expect(result.unavailable).toBeNull();
      expect(result.snapshots).toHaveLength(3);
      expect(result.snapshots.map((s) => s.currentOdds)).toEqual([1.8, 3.5, 4.2]);
      expect(result.snapshots[0]).toEqual({
        matchId: 'm1',
        bettingTypeId: 1,
        scopeId: 2,
        handicapTypeId: 0,
        handicapValue: 0,
        mixedParameterId: 0,
        outcomeIndex: 0,
        outcomeKey: 'o-home',
        outcomeName: 'home',
        bettingTypeName: '1X2',
        scopeName: 'Full Time',
        handicapTypeName: 'No Handicap',
        bookmakerId: '16',
        bookmakerName: 'bet365',
        direction: 'back',
        currentOdds: 1.8,
        openingOdds: 1.9,
        currentVolume: null,
        openingVolume: null,
        movement: 'up',
        lastChangedAt: new Date(1700000000 * 1000),
        openingChangedAt: new Date(1699990000 * 1000),
        isActive: true,
        isExchangeActiveByOutcome: false,
        hasStarted: false,
      });
    });

    test('absent per-position values fall back to null / none', () => {
      const away = normalize(payload, selector, false).snapshots[2];
      expect(away.outcomeName).toBe('away');
      expect(away.movement).toBe('none');
      expect(away.openingChangedAt).toBeNull();
      expect(away.currentVolume).toBeNull();
    });

    test('hasStarted is copied onto every snapshot', () => {
      const result = normalize(payload, selector, true);
      expect(result.snapshots.every((s) => s.hasStarted)).toBe(true);
    });

    test('same payload yields identical records', () => {
      expect(normalize(payload, selector, false)).toEqual(normalize(payload, selector, false));
    });

    test('meta carries the payload header fields', () => {
      expect(normalize(payload, selector, false).meta).toEqual({
        bettingTypeId: 1,
        scopeId: 2,
        timeBase: 1700000000,
        refreshSeconds: 20,
        encodedEventId: 'm1',
      });
    });
  });

  describe('Dictionary shapes', () => {
    test('header fields may be null or numeric strings', () => {
      const payload = {
        s: 1,
        d: {
          refresh: null,
          'time-base': '1700000000',
          encodeventId: 123,
          oddsdata: {
            back: { [MARKET]: { outcomeId: { '0': 'o-home' }, odds: { '16': { '0': 1.8 } } } },
          },
        },
      };

      const result = normalize(payload, selector, false);
      expect(result.unavailable).toBeNull();
      expect(result.issues).toEqual([]);
      expect(result.snapshots).toHaveLength(1);
      expect(result.meta).toEqual({
        bettingTypeId: null,
        scopeId: null,
        timeBase: 1700000000,
        refreshSeconds: null,
        encodedEventId: '123',
      });
    });

    test('arrays are read like index-keyed dictionaries', () => {
      const payload = envelope({
        back: {
          [MARKET]: {
            odds: { '16': [1.8, 3.5, 4.2] },
            outcomeId: ['o-home', 'o-draw', 'o-away'],
            movement: { '16': [1, -1, 0] },
          },
        },
      });

      const result = normalize(payload, selector, false);
      expect(result.snapshots.map((s) => s.outcomeKey)).toEqual(['o-home', 'o-draw', 'o-away']);
      expect(result.snapshots.map((s) => s.movement)).toEqual(['up', 'down', 'none']);
    });

    test('numeric strings are accepted for odds and status', () => {
      const payload = { ...backMarket({ odds: { '16': { '0': '2.10' } } }), s: '1' };
      expect(normalize(payload, selector, false).snapshots[0].currentOdds).toBe(2.1);
    });
  });

  describe('Exchange flags and volumes', () => {
    test('per-bookmaker scalar act with an empty volume dictionary', () => {
      const payload = backMarket({
        odds: { '16': { '0': 1.8, '1': 3.5, '2': 4.2 } },
        act: { '16': true },
        volume: {},
      });

      const result = normalize(payload, selector, false);
      expect(result.snapshots).toHaveLength(3);
      expect(result.snapshots.map((s) => [s.bookmakerId, s.direction, s.isActive, s.currentVolume])).toEqual([
        ['16', 'back', true, null],
        ['16', 'back', true, null],
        ['16', 'back', true, null],
      ]);
    });

    test('lay side keeps volumes and per-outcome exchange flags', () => {
      const payload = envelope({
        lay: {
          [MARKET]: {
            odds: { '44': { '0': 1.85 } },
            outcomeId: { '0': 'o-home' },
            volume: { '44': { '0': 120.5 } },
            openingVolume: { '44': { '0': 10 } },
            act: { '44': { '0': 1 } },
            actEx: { '44': { '0': true } },
          },
        },
      });

      const [snapshot] = normalize(payload, selector, false).snapshots;
      expect(snapshot.direction).toBe('lay');
      expect(snapshot.currentVolume).toBe(120.5);
      expect(snapshot.openingVolume).toBe(10);
      expect(snapshot.isActive).toBe(true);
      expect(snapshot.isExchangeActiveByOutcome).toBe(true);
    });

    test('bookmaker missing from a present act dictionary is inactive', () => {
      const payload = backMarket({
        odds: { '16': { '0': 1.8 } },
        act: { '18': { '0': true } },
      });
      expect(normalize(payload, selector, false).snapshots[0].isActive).toBe(false);
    });
  });

  describe('Odds bounds', () => {
    test('out-of-range and non-numeric odds are excluded with one issue each', () => {
      const payload = backMarket({
        odds: { '16': { '0': 0.5, '1': 1001, '2': 'abc' }, '18': { '0': 1.0, '1': 1000, '2': 2.5 } },
      });

      const result = normalize(payload, selector, false);
      const total = 6;

      expect(result.snapshots.map((s) => s.currentOdds)).toEqual([1.0, 1000, 2.5]);
      expect(result.issues).toHaveLength(3);
      expect(result.snapshots.length + result.issues.length).toBe(total);
      expect(result.issues.map((i) => i.message)).toEqual([
        `Odds 0.5 outside [1, 1000] at ${MARKET_PATH}.odds["16"]["0"]`,
        `Odds 1001 outside [1, 1000] at ${MARKET_PATH}.odds["16"]["1"]`,
        `Odds value "abc" is not numeric at ${MARKET_PATH}.odds["16"]["2"]`,
      ]);
      expect(result.issues[0]).toBeInstanceOf(DataQualityError);
    });
  });

  describe('Outcome mapping', () => {
    test('position missing from outcomeId is still emitted, with one issue per market', () => {
      const payload = envelope({
        back: {
          [MARKET]: {
            odds: { '16': { '0': 1.8, '1': 3.5, '2': 4.2 }, '18': { '0': 1.7, '1': 3.6, '2': 4.4 } },
            outcomeId: { '0': 'o-home', '1': 'o-draw' },
          },
        },
      });

      const result = normalize(payload, selector, false);
      expect(result.snapshots).toHaveLength(6);
      expect(result.snapshots.filter((s) => s.outcomeKey === null).map((s) => s.bookmakerId)).toEqual(['16', '18']);
      expect(result.issues.map((i) => i.message)).toEqual([
        `No outcomeId entry for position 2 at ${MARKET_PATH}.outcomeId`,
      ]);
    });

    test('betting types without a fixed table get positional names', () => {
      const payload = envelope({
        back: { 'E-8-2-0-0-0': { odds: { '16': { '0': 9.5 } }, outcomeId: { '0': 'cs-1' } } },
      });
      expect(normalize(payload, selector, false).snapshots[0].outcomeName).toBe('outcome_0');
    });
  });

  describe('Natural key', () => {
    test('a later record with the same key is excluded', () => {
      const payload = envelope({
        back: {
          [MARKET]: { odds: { '16': { '0': 1.8 } }, outcomeId: { '0': 'o-home' } },
          'E-1-2-0-0-1': { odds: { '16': { '0': 1.9 } }, outcomeId: { '0': 'o-home' } },
        },
      });

      const result = normalize(payload, selector, false);
      expect(result.snapshots).toHaveLength(1);
      expect(result.snapshots[0].currentOdds).toBe(1.8);
      expect(result.issues).toHaveLength(1);
      expect(result.issues[0].message).toBe(
        'Duplicate record for m1|1|2|0|0|16|back at $.d.oddsdata.back["E-1-2-0-0-1"].odds["16"]["0"]',
      );
    });

    test('keys are unique across a normalization', () => {
      const payload = backMarket({ odds: { '16': { '0': 1.8, '1': 3.5 }, '18': { '0': 1.7, '1': 3.6 } } });
      const keys = normalize(payload, selector, false).snapshots.map(snapshotKey);
      expect(new Set(keys).size).toBe(keys.length);
    });

    test('unparsable market keys skip the market', () => {
      const payload = envelope({ back: { 'E-1-2': { odds: { '16': { '0': 1.8 } } } } });
      const result = normalize(payload, selector, false);
      expect(result.snapshots).toEqual([]);
      expect(result.issues[0].message).toBe('Unrecognised market key at $.d.oddsdata.back["E-1-2"]');
    });
  });

  describe('History', () => {
    test('out-of-order history comes back sorted by timestamp', () => {
      const payload = envelope({
        history: {
          back: { 'o-home': { '16': [[1.9, null, 1700000100], [1.85, null, 1700000000]] } },
          lay: {},
        },
      });

      const result = normalize(payload, selector, false);
      expect(result.history).toEqual([
        {
          matchId: 'm1',
          bettingTypeId: 1,
          scopeId: 2,
          outcomeKey: 'o-home',
          bookmakerId: '16',
          direction: 'back',
          odds: 1.85,
          volume: null,
          observedAt: new Date(1700000000 * 1000),
          occurrence: 0,
        },
        {
          matchId: 'm1',
          bettingTypeId: 1,
          scopeId: 2,
          outcomeKey: 'o-home',
          bookmakerId: '16',
          direction: 'back',
          odds: 1.9,
          volume: null,
          observedAt: new Date(1700000100 * 1000),
          occurrence: 0,
        },
      ]);
    });

    test('equal timestamps keep source order and repeated odds are kept', () => {
      const payload = envelope({
        history: { back: { 'o-home': { '16': [[2.0, 5, 1700000000], [2.0, 6, 1700000000]] } }, lay: {} },
      });
      const { history } = normalize(payload, selector, false);
      expect(history.map((h) => h.volume)).toEqual([5, 6]);
      expect(history.map((h) => h.occurrence)).toEqual([0, 1]);
    });

    test('malformed tuples are excluded with an issue', () => {
      const payload = envelope({
        history: { back: { 'o-home': { '16': [[1.9, null, 1700000100], [1.8], ['x', null, 1]] } }, lay: {} },
      });

      const result = normalize(payload, selector, false);
      expect(result.history).toHaveLength(1);
      expect(result.issues.map((i) => i.message)).toEqual([
        'History entry is not [odds, volume, timestamp] at $.d.oddsdata.history.back["o-home"]["16"][1]',
        'History entry has non-numeric odds or timestamp at $.d.oddsdata.history.back["o-home"]["16"][2]',
      ]);
    });

    test('per-market history is attributed to the market direction', () => {
      const payload = envelope({
        lay: {
          [MARKET]: {
            odds: { '44': { '0': 1.85 } },
            outcomeId: { '0': 'o-home' },
            history: { 'o-home': { '44': [[1.8, 50, 1700000000]] } },
          },
        },
      });

      const [entry] = normalize(payload, selector, false).history;
      expect(entry.direction).toBe('lay');
      expect(entry.volume).toBe(50);
    });

    test('payload-level history wins over a per-market copy', () => {
      const payload = envelope({
        back: {
          [MARKET]: {
            odds: { '16': { '0': 1.8 } },
            outcomeId: { '0': 'o-home' },
            history: { 'o-home': { '16': [[1.5, null, 1600000000]] } },
          },
        },
        history: { back: { 'o-home': { '16': [[1.8, null, 1700000000]] } }, lay: {} },
      });

      const result = normalize(payload, selector, false);
      expect(result.history.map((h) => h.odds)).toEqual([1.8]);
    });
  });

  describe('Unavailable payloads', () => {
    test('non-success status yields an empty result without issues', () => {
      const result = normalize({ s: 0, d: {} }, selector, false);
      expect(result.snapshots).toEqual([]);
      expect(result.history).toEqual([]);
      expect(result.issues).toEqual([]);
      expect(result.unavailable).toEqual({ reason: 'status-0' });
    });

    test('a non-object payload is one data quality issue', () => {
      const result = normalize('not a payload', selector, false);
      expect(result.snapshots).toEqual([]);
      expect(result.issues.map((i) => i.message)).toEqual(['Payload has no status code at $']);
      expect(result.unavailable).toEqual({ reason: 'malformed-payload' });
    });

    test('success without oddsdata is one data quality issue', () => {
      const result = normalize({ s: 1, d: { bt: 1 } }, selector, false);
      expect(result.issues).toHaveLength(1);
      expect(result.issues[0].path).toBe('$.d');
      expect(result.unavailable).toEqual({ reason: 'malformed-payload' });
    });

    test('no markets and no history', () => {
      expect(normalize(envelope({}), selector, false).unavailable).toEqual({ reason: 'no-markets' });
    });
  });
});
