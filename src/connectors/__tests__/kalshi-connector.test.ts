/**
 * Unit tests for the Kalshi connector (fetch is stubbed)
 */

import { ApiError } from '../../errors/index';
import { KalshiRestConnector } from '../kalshi-connector';

const BASE_URL = 'https://kalshi.test/trade-api/v2';

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status });
}

function requestedUrl(input: string | URL | Request): URL {
  return new URL(input instanceof Request ? input.url : input.toString());
}

describe('KalshiRestConnector', () => {
  let fetchSpy: jest.SpiedFunction<typeof fetch>;

  beforeEach(() => {
    fetchSpy = jest.spyOn(global, 'fetch');
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('fetchMarkets', () => {
    it('should follow cursors and collect skipped records', async () => {
      fetchSpy
        .mockResolvedValueOnce(
          jsonResponse({
            markets: [{ ticker: 'KXNFLGAME-25NOV10MINLAC-MIN', yes_bid: 44 }, { title: 'no ticker' }],
            cursor: 'page-2',
          })
        )
        .mockResolvedValueOnce(jsonResponse({ markets: [{ ticker: 'KXNFLGAME-25NOV10MINLAC-LAC' }], cursor: '' }));
      const connector = new KalshiRestConnector(BASE_URL, () => Date.parse('2025-11-10T12:00:00Z'));

      const result = await connector.fetchMarkets('KXNFLGAME');

      expect(result).toEqual({
        data: [{ ticker: 'KXNFLGAME-25NOV10MINLAC-MIN', yes_bid: 44 }, { ticker: 'KXNFLGAME-25NOV10MINLAC-LAC' }],
        errors: ['Skipped market #1: Required'],
        fetchedAt: '2025-11-10T12:00:00.000Z',
      });

      const first = requestedUrl(fetchSpy.mock.calls[0][0]);
      expect(first.pathname).toBe('/trade-api/v2/markets');
      expect(first.searchParams.get('series_ticker')).toBe('KXNFLGAME');
      expect(first.searchParams.get('status')).toBe('open');
      expect(first.searchParams.get('limit')).toBe('200');
      expect(first.searchParams.has('cursor')).toBe(false);
      expect(requestedUrl(fetchSpy.mock.calls[1][0]).searchParams.get('cursor')).toBe('page-2');
    });

    it('should reject a listing with an unexpected shape', async () => {
      fetchSpy.mockResolvedValue(jsonResponse({ markets: 'nope' }));

      await expect(new KalshiRestConnector(BASE_URL).fetchMarkets('KXNFLGAME')).rejects.toBeInstanceOf(ApiError);
    });

    it('should surface upstream failures', async () => {
      fetchSpy.mockResolvedValue(new Response('down', { status: 503, statusText: 'Service Unavailable' }));

      await expect(new KalshiRestConnector(BASE_URL).fetchMarkets('KXNFLGAME')).rejects.toMatchObject({
        platform: 'kalshi',
        statusCode: 503,
      });
    });
  });

  describe('fetchMarket', () => {
    it('should unwrap the market record', async () => {
      fetchSpy.mockResolvedValue(jsonResponse({ market: { ticker: 'KXNFLGAME-25NOV10MINLAC-MIN', status: 'active' } }));

      await expect(new KalshiRestConnector(BASE_URL).fetchMarket('KXNFLGAME-25NOV10MINLAC-MIN')).resolves.toEqual({
        ticker: 'KXNFLGAME-25NOV10MINLAC-MIN',
        status: 'active',
      });
      expect(requestedUrl(fetchSpy.mock.calls[0][0]).pathname).toBe(
        '/trade-api/v2/markets/KXNFLGAME-25NOV10MINLAC-MIN'
      );
    });

    it('should return null for unknown tickers', async () => {
      fetchSpy.mockResolvedValue(new Response('{}', { status: 404, statusText: 'Not Found' }));

      await expect(new KalshiRestConnector(BASE_URL).fetchMarket('NOPE')).resolves.toBeNull();
    });
  });

  describe('fetchHistory', () => {
    it('should request the window ending now and convert cents to dollars', async () => {
      fetchSpy.mockResolvedValue(
        jsonResponse({
          candlesticks: [
            { end_period_ts: 1_699_999_200, price: { open: 40, high: 45, low: null, close: 44 }, volume: 12 },
          ],
        })
      );
      const connector = new KalshiRestConnector(BASE_URL, () => 1_700_000_000_000);

      const candles = await connector.fetchHistory('KXNFLGAME', 'KXNFLGAME-25NOV10MINLAC-MIN', { days: 2, interval: 60 });

      expect(candles).toEqual([
        { timestamp: '2023-11-14T22:00:00.000Z', open: 0.4, high: 0.45, low: null, close: 0.44, volume: 12 },
      ]);

      const url = requestedUrl(fetchSpy.mock.calls[0][0]);
      expect(url.pathname).toBe('/trade-api/v2/series/KXNFLGAME/markets/KXNFLGAME-25NOV10MINLAC-MIN/candlesticks');
      expect(url.searchParams.get('period_interval')).toBe('60');
      expect(url.searchParams.get('start_ts')).toBe('1699827200');
      expect(url.searchParams.get('end_ts')).toBe('1700000000');
    });
  });

  describe('fetchOrderBook', () => {
    it('should convert levels to dollars, best price first', async () => {
      fetchSpy.mockResolvedValue(jsonResponse({ orderbook: { yes: [[40, 100], [44, 20]], no: null } }));

      await expect(new KalshiRestConnector(BASE_URL).fetchOrderBook('KXNFLGAME-25NOV10MINLAC-MIN')).resolves.toEqual({
        ticker: 'KXNFLGAME-25NOV10MINLAC-MIN',
        yes: [
          { price: 0.44, quantity: 20 },
          { price: 0.4, quantity: 100 },
        ],
        no: [],
      });
    });
  });
});
