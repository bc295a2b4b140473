// Unit tests for league / season discovery

import {
  LeagueResolver,
  isStructuralUrlChange,
  parseLeagueUrl,
} from '../adapters/LeagueResolver';
import { silentLogger } from '../adapters/DataSourceAdapter';
import { StructuralChangeError } from '../lib/errors';
import { StubFetcher } from './helpers/stub-fetcher';

const LEAGUE_URL = 'https://www.oddsportal.com/football/england/premier-league/';
const RESULTS_URL = `${LEAGUE_URL}results/`;

const LEAGUE_PAGE = `
<html><head>
<script>var pageOutrightsVar = '{"id":"AbCd1234","sid":1}';</script>
<script>window.sportConfig = {"sid":1,"lang":"en"};</script>
</head><body>
<a href="/football/england/premier-league/">Next matches</a>
<a href="/football/england/premier-league-2022-2023/results/">2022/2023</a>
<a href="/football/england/premier-league-2021-2022/results/">2021/2022</a>
<a href="/football/england/premier-league-2022-2023/results/">2022/2023 again</a>
<a href="/football/england/championship-2022-2023/results/">Other league</a>
</body></html>`;

describe('League resolver', () => {
  test('league with a current and two historical seasons', async () => {
    const fetcher = new StubFetcher({ [RESULTS_URL]: LEAGUE_PAGE });
    const { league, seasons } = await new LeagueResolver(fetcher, silentLogger).resolve(LEAGUE_URL);

    expect(fetcher.urls()).toEqual([RESULTS_URL]);
    expect(league).toEqual({
      sportId: '1',
      countryId: 'england',
      leagueId: 'AbCd1234',
      leagueUrl: LEAGUE_URL,
      isActive: true,
      sportSlug: 'football',
      countrySlug: 'england',
      leagueSlug: 'premier-league',
    });

    expect(seasons).toHaveLength(3);
    expect(seasons.filter((s) => s.isCurrent)).toHaveLength(1);
    expect(seasons.map((s) => s.seasonId)).toEqual(['current', '2022-2023', '2021-2022']);
    expect(seasons[0]).toEqual({
      seasonId: 'current',
      leagueId: 'AbCd1234',
      isCurrent: true,
      hasResults: true,
      hasFixtures: true,
      seasonUrl: LEAGUE_URL,
      startYear: null,
    });
    expect(seasons[1].seasonUrl).toBe('https://www.oddsportal.com/football/england/premier-league-2022-2023/');
    expect(seasons[1].hasFixtures).toBe(false);
    expect(seasons[1].startYear).toBe(2022);
  });

  test('accepts the /results/ URL and a missing trailing slash', async () => {
    const fetcher = new StubFetcher({ [RESULTS_URL]: LEAGUE_PAGE });
    const resolver = new LeagueResolver(fetcher, silentLogger);

    const discovery = await resolver.resolve('https://www.oddsportal.com/football/england/premier-league/results');
    expect(discovery.league.leagueUrl).toBe(LEAGUE_URL);
  });

  test('page without a fixtures link has a results-only current season', async () => {
    const page = LEAGUE_PAGE.replace('<a href="/football/england/premier-league/">Next matches</a>', '');
    const fetcher = new StubFetcher({ [RESULTS_URL]: page });

    const { seasons } = await new LeagueResolver(fetcher, silentLogger).resolve(LEAGUE_URL);
    expect(seasons[0].hasFixtures).toBe(false);
  });

  test('league id falls back to the slug', async () => {
    const fetcher = new StubFetcher({ [RESULTS_URL]: '<script>var x = {"sid":3};</script>' });
    const { league, seasons } = await new LeagueResolver(fetcher, silentLogger).resolve(LEAGUE_URL);

    expect(league.sportId).toBe('3');
    expect(league.leagueId).toBe('premier-league');
    expect(seasons).toHaveLength(1);
  });

  test('seasons listed only in the season dropdown', async () => {
    const page = `<script>var x = {"sid":1};</script>
<select id="season-select">
<option value="https://www.oddsportal.com/football/england/premier-league-2020-2021/results/">2020/2021</option>
<option value="#">-</option>
</select>`;
    const fetcher = new StubFetcher({ [RESULTS_URL]: page });
    const { seasons } = await new LeagueResolver(fetcher, silentLogger).resolve(LEAGUE_URL);

    expect(seasons.map((s) => s.seasonId)).toEqual(['current', '2020-2021']);
    expect(seasons[1].seasonUrl).toBe('https://www.oddsportal.com/football/england/premier-league-2020-2021/');
  });

  test('page without a sport id is a structural change', async () => {
    const fetcher = new StubFetcher({ [RESULTS_URL]: '<html><body>Maintenance</body></html>' });
    await expect(new LeagueResolver(fetcher, silentLogger).resolve(LEAGUE_URL)).rejects.toBeInstanceOf(
      StructuralChangeError,
    );
  });
});

describe('League URLs', () => {
  test('splits slugs', () => {
    expect(parseLeagueUrl('https://www.oddsportal.com/basketball/usa/nba/results/')).toEqual({
      origin: 'https://www.oddsportal.com',
      sportSlug: 'basketball',
      countrySlug: 'usa',
      leagueSlug: 'nba',
      canonicalUrl: 'https://www.oddsportal.com/basketball/usa/nba/',
    });
  });

  test('rejects URLs that are not league pages', () => {
    expect(() => parseLeagueUrl('https://www.oddsportal.com/football/')).toThrow(/League URL/);
  });

  test('scheme, host case, trailing slash and /results are not structural changes', () => {
    expect(isStructuralUrlChange(LEAGUE_URL, 'http://WWW.oddsportal.com/football/england/premier-league/results')).toBe(
      false,
    );
  });

  test('a different path is a structural change', () => {
    expect(isStructuralUrlChange(LEAGUE_URL, 'https://www.oddsportal.com/football/england/premier-league-2/')).toBe(
      true,
    );
  });
});
