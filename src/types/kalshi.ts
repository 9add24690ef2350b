/**
 * Kalshi API Type Definitions
 * Based on https://api.elections.kalshi.com/trade-api/v2
 *
 * Only the fields the explorer reads are declared. Price and volume fields
 * are left as `unknown`: upstream sends numbers, numeric strings or nothing,
 * and the field fallback resolver decides what is usable.
 */

import { z } from 'zod';

// ============ Market Types ============

export const RawMarketRecordSchema = z.object({
  ticker: z.string().min(1),
  event_ticker: z.string().nullish(),
  series_ticker: z.string().nullish(),
  title: z.string().nullish(),
  subtitle: z.string().nullish(),
  yes_sub_title: z.string().nullish(),
  status: z.string().nullish(),

  // Pricing (in cents, 0-100)
  yes_bid: z.unknown(),
  yes_ask: z.unknown(),
  last_price: z.unknown(),
  /** Midpoint in cents, present on some feed variants */
  midpoint: z.unknown(),

  // Volume & Liquidity
  volume: z.unknown(),
  volume_24h: z.unknown(),
  liquidity: z.unknown(),
  open_interest: z.unknown(),

  // Timing
  close_time: z.string().nullish(),
});

/** One market as received from Kalshi; never mutated by the pipeline */
export type RawMarketRecord = z.infer<typeof RawMarketRecordSchema>;

export const KalshiMarketsPageSchema = z.object({
  markets: z.array(z.unknown()).default([]),
  cursor: z.string().nullish(),
});

export const KalshiMarketDetailSchema = z.object({
  market: z.unknown(),
});

// ============ Price History ============

const CandlePriceSchema = z.object({
  open: z.number().nullish(),
  high: z.number().nullish(),
  low: z.number().nullish(),
  close: z.number().nullish(),
});

export const KalshiCandlesticksSchema = z.object({
  candlesticks: z
    .array(
      z.object({
        end_period_ts: z.number(),
        price: CandlePriceSchema.nullish(),
        volume: z.number().nullish(),
      })
    )
    .default([]),
});

/** One candlestick with prices converted to dollars */
export interface Candlestick {
  /** ISO 8601 end of the period */
  timestamp: string;
  open: number | null;
  high: number | null;
  low: number | null;
  close: number | null;
  volume: number;
}

// ============ Order Book ============

/** Kalshi returns each side as [priceCents, quantity] pairs */
const PriceLevelsSchema = z.array(z.tuple([z.number(), z.number()])).nullish();

export const KalshiOrderBookSchema = z.object({
  orderbook: z
    .object({
      yes: PriceLevelsSchema,
      no: PriceLevelsSchema,
    })
    .default({}),
});

export interface OrderBookLevel {
  /** Price in dollars (0-1) */
  price: number;
  quantity: number;
}

export interface OrderBook {
  ticker: string;
  yes: OrderBookLevel[];
  no: OrderBookLevel[];
}
