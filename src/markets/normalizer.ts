/**
 * Market Normalizer
 *
 * Converts one raw Kalshi record into a display-ready NormalizedMarket.
 * Never throws: anything that cannot be derived is null, and unparseable
 * tickers fall back to the raw ticker string.
 */

import type { SportConfig } from '../config/sports.js';
import {
  eventTickerOf,
  OTHER_CATEGORY,
  parseTicker,
  type ParsedTicker,
} from '../matching/kalshi/ticker-parser.js';
import type { RawMarketRecord } from '../types/kalshi.js';
import {
  GENERAL_MATCHUP,
  type MatchupOrGeneral,
  type NormalizedMarket,
} from '../types/markets.js';
import {
  resolveOpenInterest,
  resolvePrice,
  resolveProbabilityWithSource,
  resolveVolume,
} from './field-resolver.js';

function nonEmpty(value: string | null | undefined): string | null {
  const trimmed = value?.trim();
  return trimmed ? trimmed : null;
}

/**
 * Canonical [away, home] from the ticker's team codes. The parser only
 * splits a run into codes the registry knows, so a ticker either names
 * both teams or carries no matchup.
 */
function resolveMatchup(parsed: ParsedTicker | null, sport: SportConfig): MatchupOrGeneral {
  if (!parsed?.teamCodes) return GENERAL_MATCHUP;

  const [awayCode, homeCode] = parsed.teamCodes;
  const away = sport.registry.resolveCode(awayCode);
  const home = sport.registry.resolveCode(homeCode);
  return away && home ? [away, home] : GENERAL_MATCHUP;
}

/**
 * Name built from the ticker alone, used when the record has no title.
 */
function tickerDisplayName(
  ticker: string,
  parsed: ParsedTicker | null,
  matchup: MatchupOrGeneral
): string {
  if (!parsed || matchup === GENERAL_MATCHUP) return ticker;

  const [away, home] = matchup;
  const game = `${away} at ${home}`;
  return parsed.categoryCode === 'GAME' ? game : `${game}: ${parsed.category}`;
}

/**
 * Normalize one raw market record for a sport.
 */
export function normalizeMarket(raw: RawMarketRecord, sport: SportConfig): NormalizedMarket {
  const parsed = parseTicker(raw.ticker, sport);
  const matchup = resolveMatchup(parsed, sport);

  const title = nonEmpty(raw.title) ?? nonEmpty(raw.subtitle);
  const displayName = title
    ? sport.registry.expandTeamNames(title)
    : tickerDisplayName(raw.ticker, parsed, matchup);

  const outcomeCode = parsed?.outcomeCode;
  const subjectTeam = outcomeCode ? sport.registry.resolveCode(outcomeCode) : null;

  const price = resolveProbabilityWithSource(raw);

  return {
    ticker: raw.ticker,
    eventTicker: nonEmpty(raw.event_ticker) ?? eventTickerOf(raw.ticker),
    category: parsed?.category ?? OTHER_CATEGORY,
    matchup,
    displayName,
    subjectTeam,
    probability: price?.probability ?? null,
    probabilitySource: price?.field ?? null,
    yesBid: resolvePrice(raw, 'yes_bid'),
    yesAsk: resolvePrice(raw, 'yes_ask'),
    volume: resolveVolume(raw),
    openInterest: resolveOpenInterest(raw),
    gameDate: parsed?.date ?? null,
    closeTime: nonEmpty(raw.close_time),
  };
}

/**
 * Normalize a batch, preserving input order.
 */
export function normalizeMarkets(
  raws: readonly RawMarketRecord[],
  sport: SportConfig
): NormalizedMarket[] {
  return raws.map((raw) => normalizeMarket(raw, sport));
}
