/**
 * Field Fallback Resolver
 *
 * Kalshi records carry several fields with overlapping meaning. Each
 * resolver walks a fixed priority list and returns the first usable value;
 * values are never averaged across fields and invalid ones are skipped
 * rather than read as zero.
 */

import type { RawMarketRecord } from '../types/kalshi.js';
import type { ProbabilityField } from '../types/markets.js';

type VolumeField = 'volume' | 'volume_24h' | 'liquidity';

/** Price fields (cents) in priority order */
export const PROBABILITY_FIELDS: readonly ProbabilityField[] = ['yes_bid', 'last_price', 'midpoint'];

/** Volume-like fields in priority order */
export const VOLUME_FIELDS: readonly VolumeField[] = ['volume', 'volume_24h', 'liquidity'];

/**
 * Read a number from an upstream value. Accepts finite numbers and
 * numeric strings; everything else is absent.
 */
export function toFiniteNumber(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

/**
 * Probability with the field it came from.
 */
export function resolveProbabilityWithSource(
  record: RawMarketRecord
): { probability: number; field: ProbabilityField } | null {
  for (const field of PROBABILITY_FIELDS) {
    const cents = toFiniteNumber(record[field]);
    if (cents === null || cents < 0 || cents > 100) continue;
    return { probability: cents / 100, field };
  }
  return null;
}

/**
 * A single cent-denominated quote in dollars, or null when it is missing
 * or outside 0-100 cents.
 */
export function resolvePrice(record: RawMarketRecord, field: 'yes_bid' | 'yes_ask'): number | null {
  const cents = toFiniteNumber(record[field]);
  return cents === null || cents < 0 || cents > 100 ? null : cents / 100;
}

/**
 * Implied YES probability in [0, 1]: bid, then last trade, then midpoint.
 */
export function resolveProbability(record: RawMarketRecord): number | null {
  return resolveProbabilityWithSource(record)?.probability ?? null;
}

/**
 * Traded volume: total, then 24-hour, then liquidity.
 */
export function resolveVolume(record: RawMarketRecord): number | null {
  for (const field of VOLUME_FIELDS) {
    const value = toFiniteNumber(record[field]);
    if (value !== null && value >= 0) return value;
  }
  return null;
}

export function resolveOpenInterest(record: RawMarketRecord): number | null {
  const value = toFiniteNumber(record.open_interest);
  return value !== null && value >= 0 ? value : null;
}
