/**
 * Market Pairer
 *
 * Kalshi lists one contract per team for each game. This groups normalized
 * contracts by parent event and merges each opposing pair into one
 * CombinedMarket carrying both teams' prices.
 */

import {
  GENERAL_MATCHUP,
  type CombinedMarket,
  type Matchup,
  type MarketSide,
  type NormalizedMarket,
  type PairedMarket,
} from '../types/markets.js';
import type { TeamSide } from '../types/stats.js';

function maxNullable(a: number | null, b: number | null): number | null {
  if (a === null) return b;
  if (b === null) return a;
  return Math.max(a, b);
}

function sumNullable(a: number | null, b: number | null): number | null {
  if (a === null && b === null) return null;
  return (a ?? 0) + (b ?? 0);
}

function earliest(a: string | null, b: string | null): string | null {
  if (a === null) return b;
  if (b === null) return a;
  return Date.parse(b) < Date.parse(a) ? b : a;
}

/** Cents-rounded complement of a dollar price */
function complement(price: number | null): number | null {
  return price === null ? null : Math.round((1 - price) * 100) / 100;
}

function sideInMatchup(market: NormalizedMarket, matchup: Matchup): TeamSide | null {
  if (market.subjectTeam === null) return null;
  if (market.subjectTeam === matchup[0]) return 'away';
  if (market.subjectTeam === matchup[1]) return 'home';
  return null;
}

/**
 * Order two contracts as [away, home].
 *
 * A subject team found in the matchup decides, even when only one of the
 * two contracts has one. Otherwise the lexically smaller ticker is the
 * away side, which is stable across re-fetches of the same event.
 */
function orient(a: NormalizedMarket, b: NormalizedMarket): [NormalizedMarket, NormalizedMarket] {
  const matchup = a.matchup !== GENERAL_MATCHUP ? a.matchup : b.matchup;

  if (matchup !== GENERAL_MATCHUP) {
    const sideA = sideInMatchup(a, matchup);
    const sideB = sideInMatchup(b, matchup);
    if (sideA === 'away' || sideB === 'home') return [a, b];
    if (sideA === 'home' || sideB === 'away') return [b, a];
  }

  return a.ticker <= b.ticker ? [a, b] : [b, a];
}

function toSide(market: NormalizedMarket, opponent: NormalizedMarket, fallbackTeam: string): MarketSide {
  return {
    team: market.subjectTeam ?? fallbackTeam,
    probability: market.probability,
    ticker: market.ticker,
    bid: market.yesBid,
    ask: market.yesAsk,
    noBid: complement(opponent.yesAsk ?? market.yesAsk),
    noAsk: complement(opponent.yesBid ?? market.yesBid),
  };
}

/**
 * Merge two contracts of one event, or null when they are not opposing
 * outcomes (both about the same team, or both landing on one side name).
 */
export function combinePair(a: NormalizedMarket, b: NormalizedMarket): CombinedMarket | null {
  if (a.subjectTeam !== null && a.subjectTeam === b.subjectTeam) return null;

  const [away, home] = orient(a, b);
  const matchup = away.matchup !== GENERAL_MATCHUP ? away.matchup : home.matchup;

  const awayName = matchup !== GENERAL_MATCHUP ? matchup[0] : away.displayName;
  const homeName = matchup !== GENERAL_MATCHUP ? matchup[1] : home.displayName;

  const awaySide = toSide(away, home, awayName);
  const homeSide = toSide(home, away, homeName);
  if (awaySide.team === homeSide.team) return null;

  return {
    kind: 'combined',
    eventTicker: away.eventTicker,
    category: away.category,
    matchup,
    displayName: matchup !== GENERAL_MATCHUP ? `${awayName} at ${homeName}` : away.displayName,
    away: awaySide,
    home: homeSide,
    volume: maxNullable(away.volume, home.volume),
    openInterest: sumNullable(away.openInterest, home.openInterest),
    gameDate: away.gameDate ?? home.gameDate,
    closeTime: earliest(away.closeTime, home.closeTime),
  };
}

/**
 * Group contracts by parent event and pair them.
 *
 * Events appear in order of their first contract. Groups that are not
 * exactly two opposing contracts pass through as single-sided records.
 */
export function combinePairs(markets: readonly NormalizedMarket[]): PairedMarket[] {
  const groups = new Map<string, NormalizedMarket[]>();
  for (const market of markets) {
    const group = groups.get(market.eventTicker);
    if (group) {
      group.push(market);
    } else {
      groups.set(market.eventTicker, [market]);
    }
  }

  const paired: PairedMarket[] = [];
  for (const [eventTicker, group] of groups) {
    const combined = group.length === 2 ? combinePair(group[0], group[1]) : null;
    if (combined) {
      paired.push(combined);
      continue;
    }
    for (const market of group) {
      paired.push({ kind: 'single', eventTicker, market });
    }
  }

  return paired;
}
