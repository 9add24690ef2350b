/**
 * Unit tests for the market normalizer
 */

import { buildSportConfig } from '../../config/sports';
import type { RawMarketRecord } from '../../types/kalshi';
import { GENERAL_MATCHUP } from '../../types/markets';
import { normalizeMarket, normalizeMarkets } from '../normalizer';

const nfl = buildSportConfig('nfl');

describe('Market Normalizer', () => {
  it('should derive matchup, category and name from a game ticker', () => {
    const raw: RawMarketRecord = {
      ticker: 'KXNFLGAME-25NOV10MINLAC-MIN',
      event_ticker: 'KXNFLGAME-25NOV10MINLAC',
      last_price: 62,
      volume: 1500,
      close_time: '2025-11-11T04:00:00Z',
    };

    expect(normalizeMarket(raw, nfl)).toEqual({
      ticker: 'KXNFLGAME-25NOV10MINLAC-MIN',
      eventTicker: 'KXNFLGAME-25NOV10MINLAC',
      category: 'Games',
      matchup: ['Minnesota Vikings', 'Los Angeles Chargers'],
      displayName: 'Minnesota Vikings at Los Angeles Chargers',
      subjectTeam: 'Minnesota Vikings',
      probability: 0.62,
      probabilitySource: 'last_price',
      yesBid: null,
      yesAsk: null,
      volume: 1500,
      openInterest: null,
      gameDate: '2025-11-10',
      closeTime: '2025-11-11T04:00:00Z',
    });
  });

  it('should expand partial team names in the title', () => {
    const market = normalizeMarket(
      { ticker: 'KXNFLGAME-25NOV10MINLAC-LAC', title: 'Minnesota at Los Angeles C Winner?' },
      nfl
    );

    expect(market.displayName).toBe('Minnesota Vikings at Los Angeles Chargers Winner?');
    expect(market.subjectTeam).toBe('Los Angeles Chargers');
  });

  it('should fall back to the subtitle when the title is blank', () => {
    const market = normalizeMarket(
      { ticker: 'KXNFLGAME-25NOV10MINLAC-MIN', title: '  ', subtitle: 'KC at LV' },
      nfl
    );

    expect(market.displayName).toBe('Kansas City Chiefs at Las Vegas Raiders');
  });

  it('should append the category to prop market names', () => {
    const market = normalizeMarket({ ticker: 'KXNFLPASSYDS-25NOV10MINLAC-JJ250' }, nfl);

    expect(market.category).toBe('Passing Yards');
    expect(market.displayName).toBe('Minnesota Vikings at Los Angeles Chargers: Passing Yards');
    expect(market.subjectTeam).toBeNull();
  });

  it('should derive the event ticker when the record has none', () => {
    expect(normalizeMarket({ ticker: 'KXNFLGAME-25NOV10MINLAC-MIN' }, nfl).eventTicker).toBe(
      'KXNFLGAME-25NOV10MINLAC'
    );
  });

  it('should pass unparseable tickers through with no data markers', () => {
    expect(normalizeMarket({ ticker: 'XYZ123' }, nfl)).toEqual({
      ticker: 'XYZ123',
      eventTicker: 'XYZ123',
      category: 'Other',
      matchup: GENERAL_MATCHUP,
      displayName: 'XYZ123',
      subjectTeam: null,
      probability: null,
      probabilitySource: null,
      yesBid: null,
      yesAsk: null,
      volume: null,
      openInterest: null,
      gameDate: null,
      closeTime: null,
    });
  });

  it('should leave the matchup general when the team run holds no known codes', () => {
    const market = normalizeMarket({ ticker: 'KXNFLGAME-25NOV10ZZZQQQ' }, nfl);

    expect(market.matchup).toBe(GENERAL_MATCHUP);
    expect(market.displayName).toBe('KXNFLGAME-25NOV10ZZZQQQ');
    expect(market.gameDate).toBe('2025-11-10');
  });

  it('should carry validated YES quotes in dollars', () => {
    const market = normalizeMarket({ ticker: 'KXNFLGAME-25NOV10MINLAC-MIN', yes_bid: '41', yes_ask: 140 }, nfl);

    expect(market.yesBid).toBe(0.41);
    expect(market.yesAsk).toBeNull();
  });

  it('should be idempotent and leave the raw record untouched', () => {
    const raw: RawMarketRecord = { ticker: 'KXNFLGAME-25DEC07KCLV-KC', yes_bid: '57', volume_24h: 80 };
    const copy = { ...raw };

    const first = normalizeMarket(raw, nfl);
    const second = normalizeMarket(raw, nfl);

    expect(second).toEqual(first);
    expect(raw).toEqual(copy);
  });

  it('should preserve input order in batches', () => {
    const markets = normalizeMarkets(
      [{ ticker: 'XYZ123' }, { ticker: 'KXNFLGAME-25DEC07KCLV-KC' }, { ticker: 'ABC' }],
      nfl
    );

    expect(markets.map((market) => market.ticker)).toEqual(['XYZ123', 'KXNFLGAME-25DEC07KCLV-KC', 'ABC']);
  });
});
