/**
 * Kalshi Connector
 *
 * Fetches sports markets from Kalshi's public trade API.
 *
 * API Documentation: https://trading-api.readme.io/reference
 *
 * Key API quirks handled:
 * - Listings are cursor paginated; an empty cursor ends the listing
 * - Prices are integer cents (0-100); history and order book are converted
 *   to dollars here, market records are passed through raw for the normalizer
 * - Individual records may be malformed; they are skipped and logged, not fatal
 */

import { KALSHI } from '../config/api.js';
import { ApiError } from '../errors/index.js';
import { fetchJson, parseResponse, withRetry } from '../helpers/helpers.js';
import { createLogger } from '../helpers/logger.js';
import type { FetchResult } from '../types/common.js';
import {
  KalshiCandlesticksSchema,
  KalshiMarketDetailSchema,
  KalshiMarketsPageSchema,
  KalshiOrderBookSchema,
  RawMarketRecordSchema,
  type Candlestick,
  type OrderBook,
  type OrderBookLevel,
  type RawMarketRecord,
} from '../types/kalshi.js';

const log = createLogger('Kalshi');

const SECONDS_PER_DAY = 86_400;

export interface HistoryOptions {
  /** Days of history ending now */
  days: number;
  /** Candle period in minutes */
  interval: number;
}

/**
 * Market data operations the explorer needs from Kalshi.
 */
export interface KalshiConnector {
  /** Every open market of a series, across all cursor pages */
  fetchMarkets(seriesTicker: string): Promise<FetchResult<RawMarketRecord>>;

  /** One market, or null when Kalshi does not know the ticker */
  fetchMarket(ticker: string): Promise<RawMarketRecord | null>;

  fetchHistory(seriesTicker: string, ticker: string, options: HistoryOptions): Promise<Candlestick[]>;

  fetchOrderBook(ticker: string): Promise<OrderBook>;
}

// ============ Conversion Helpers ============

function centsToDollars(cents: number | null | undefined): number | null {
  return typeof cents === 'number' && Number.isFinite(cents) ? cents / 100 : null;
}

function toLevels(levels: ReadonlyArray<readonly [number, number]> | null | undefined): OrderBookLevel[] {
  return (levels ?? [])
    .map(([price, quantity]) => ({ price: price / 100, quantity }))
    .sort((a, b) => b.price - a.price);
}

/**
 * Validate raw listing entries one by one, collecting the rejects.
 */
export function parseMarketRecords(entries: readonly unknown[], errors: string[]): RawMarketRecord[] {
  const markets: RawMarketRecord[] = [];
  entries.forEach((entry, index) => {
    const parsed = RawMarketRecordSchema.safeParse(entry);
    if (parsed.success) {
      markets.push(parsed.data);
    } else {
      errors.push(`Skipped market #${index}: ${parsed.error.issues[0]?.message ?? 'invalid record'}`);
    }
  });
  return markets;
}

// ============ Connector Implementation ============

export class KalshiRestConnector implements KalshiConnector {
  constructor(
    private readonly baseUrl: string = KALSHI.API_URL,
    private readonly now: () => number = Date.now
  ) {}

  private get(path: string, params: Record<string, string> = {}): Promise<unknown> {
    const url = new URL(`${this.baseUrl}${path}`);
    for (const [key, value] of Object.entries(params)) {
      url.searchParams.set(key, value);
    }
    return withRetry(() => fetchJson(url, { platform: 'kalshi', timeoutMs: KALSHI.TIMEOUT_MS }));
  }

  async fetchMarkets(seriesTicker: string): Promise<FetchResult<RawMarketRecord>> {
    const errors: string[] = [];
    const data: RawMarketRecord[] = [];
    let cursor: string | null = null;

    for (let page = 0; page < KALSHI.MAX_PAGES; page++) {
      const params: Record<string, string> = {
        series_ticker: seriesTicker,
        status: 'open',
        limit: String(KALSHI.PAGE_LIMIT),
      };
      if (cursor) params.cursor = cursor;

      const body = parseResponse(KalshiMarketsPageSchema, await this.get('/markets', params), 'kalshi', 'markets');
      data.push(...parseMarketRecords(body.markets, errors));

      cursor = body.cursor || null;
      if (!cursor) break;
      if (page === KALSHI.MAX_PAGES - 1) {
        errors.push(`Stopped after ${KALSHI.MAX_PAGES} pages for ${seriesTicker}`);
      }
    }

    if (errors.length > 0) {
      log.warn(`${seriesTicker}: ${errors.length} listing issue(s)`);
    }
    log.debug(`${seriesTicker}: fetched ${data.length} markets`);

    return { data, errors, fetchedAt: new Date(this.now()).toISOString() };
  }

  async fetchMarket(ticker: string): Promise<RawMarketRecord | null> {
    let body: unknown;
    try {
      body = await this.get(`/markets/${encodeURIComponent(ticker)}`);
    } catch (error) {
      if (error instanceof ApiError && error.statusCode === 404) return null;
      throw error;
    }

    const { market } = parseResponse(KalshiMarketDetailSchema, body, 'kalshi', 'market');
    return parseResponse(RawMarketRecordSchema, market, 'kalshi', 'market');
  }

  async fetchHistory(seriesTicker: string, ticker: string, options: HistoryOptions): Promise<Candlestick[]> {
    const endTs = Math.floor(this.now() / 1000);
    const startTs = endTs - options.days * SECONDS_PER_DAY;

    const body = parseResponse(
      KalshiCandlesticksSchema,
      await this.get(
        `/series/${encodeURIComponent(seriesTicker)}/markets/${encodeURIComponent(ticker)}/candlesticks`,
        {
          period_interval: String(options.interval),
          start_ts: String(startTs),
          end_ts: String(endTs),
        }
      ),
      'kalshi',
      'candlesticks'
    );

    return body.candlesticks.map((candle) => ({
      timestamp: new Date(candle.end_period_ts * 1000).toISOString(),
      open: centsToDollars(candle.price?.open),
      high: centsToDollars(candle.price?.high),
      low: centsToDollars(candle.price?.low),
      close: centsToDollars(candle.price?.close),
      volume: candle.volume ?? 0,
    }));
  }

  async fetchOrderBook(ticker: string): Promise<OrderBook> {
    const { orderbook } = parseResponse(
      KalshiOrderBookSchema,
      await this.get(`/markets/${encodeURIComponent(ticker)}/orderbook`),
      'kalshi',
      'orderbook'
    );

    return {
      ticker,
      yes: toLevels(orderbook.yes),
      no: toLevels(orderbook.no),
    };
  }
}
