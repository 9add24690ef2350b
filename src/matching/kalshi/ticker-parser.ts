/**
 * Kalshi Ticker Parser
 *
 * Parses Kalshi sports tickers into category, game date and team codes.
 *
 * Format: {PREFIX}{CATEGORY}-{YY}{MON}{DD}{AWAY}{HOME}[-{OUTCOME}]
 * Example: KXNFLGAME-25NOV10MINLAC-MIN
 *
 * Team codes are two or three letters and not delimited, so the trailing
 * letter run is split from the end against the sport's known codes.
 */

import type { SportConfig } from '../../config/sports.js';

// ============ Constants ============

const MONTHS_SHORT = [
  'JAN', 'FEB', 'MAR', 'APR', 'MAY', 'JUN',
  'JUL', 'AUG', 'SEP', 'OCT', 'NOV', 'DEC',
];

/** Multivariate (multi-leg) series share this prefix across sports */
export const KALSHI_PARLAY_PREFIX = 'KXMVE';

export const PARLAY_CATEGORY = 'Same Game Parlays';

export const OTHER_CATEGORY = 'Other';

/** Date segment, optionally followed by a start time, then the team run */
const KALSHI_EVENT_SEGMENT_REGEX = /^(\d{2})([A-Z]{3})(\d{2})(?:\d{4})?([A-Z]*)$/;

/** Longest code first: a 3-letter code is tried before its 2-letter tail */
const CODE_LENGTHS = [3, 2];

// ============ Types ============

export interface ParsedTicker {
  /** First ticker segment, e.g. "KXNFLGAME" */
  seriesTicker: string;

  /** Series remainder after the sport prefix, e.g. "GAME" */
  categoryCode: string;

  category: string;

  /** YYYY-MM-DD */
  date: string | null;

  /** [away, home] as written in the ticker */
  teamCodes: readonly [string, string] | null;

  /** Trailing segment naming the contract's outcome, e.g. "MIN" */
  outcomeCode: string | null;
}

// ============ Team Code Splitting ============

/**
 * Split a run of letters into exactly `count` known codes, scanning from
 * the end and backtracking when a choice leaves an unsplittable prefix.
 *
 * @example
 * splitTeamCodes('MINLAC', 2, isCode) // ['MIN', 'LAC']
 * splitTeamCodes('KCLV', 2, isCode)   // ['KC', 'LV']
 */
export function splitTeamCodes(
  run: string,
  count: number,
  isCode: (code: string) => boolean
): string[] | null {
  if (count === 0) return run.length === 0 ? [] : null;

  for (const length of CODE_LENGTHS) {
    if (run.length < length) continue;

    const code = run.slice(-length);
    if (!isCode(code)) continue;

    const rest = splitTeamCodes(run.slice(0, -length), count - 1, isCode);
    if (rest) return [...rest, code];
  }

  return null;
}

function parseDate(yy: string, mon: string, dd: string): string | null {
  const monthIndex = MONTHS_SHORT.indexOf(mon);
  if (monthIndex === -1) return null;

  const day = parseInt(dd, 10);
  if (day < 1 || day > 31) return null;

  const month = String(monthIndex + 1).padStart(2, '0');
  return `20${yy}-${month}-${dd}`;
}

// ============ Ticker Parsing ============

/**
 * Parse a Kalshi ticker for one sport.
 *
 * @param ticker - e.g., "KXNFLGAME-25NOV10MINLAC"
 * @returns Parsed data, or null when the ticker does not follow the sport's format
 */
export function parseTicker(ticker: string, sport: SportConfig): ParsedTicker | null {
  const segments = ticker.trim().toUpperCase().split('-');
  const [seriesTicker, eventSegment, ...outcome] = segments;
  if (!seriesTicker) return null;

  if (seriesTicker.startsWith(KALSHI_PARLAY_PREFIX)) {
    return {
      seriesTicker,
      categoryCode: seriesTicker.slice(KALSHI_PARLAY_PREFIX.length),
      category: PARLAY_CATEGORY,
      date: null,
      teamCodes: null,
      outcomeCode: null,
    };
  }

  if (!seriesTicker.startsWith(sport.tickerPrefix) || !eventSegment) return null;

  const categoryCode = seriesTicker.slice(sport.tickerPrefix.length);
  if (!categoryCode) return null;

  const match = eventSegment.match(KALSHI_EVENT_SEGMENT_REGEX);
  if (!match) return null;

  const [, yy, mon, dd, teamRun] = match;
  const date = parseDate(yy, mon, dd);
  if (!date) return null;

  const codes = teamRun ? splitTeamCodes(teamRun, 2, (code) => sport.registry.hasCode(code)) : null;

  return {
    seriesTicker,
    categoryCode,
    category: sport.categories[categoryCode] ?? OTHER_CATEGORY,
    date,
    teamCodes: codes ? [codes[0], codes[1]] : null,
    outcomeCode: outcome.length > 0 ? outcome.join('-') : null,
  };
}

/**
 * Parent event ticker of a market ticker: everything before the outcome
 * segment. Tickers without an outcome segment are their own event.
 */
export function eventTickerOf(ticker: string): string {
  const segments = ticker.split('-');
  return segments.length >= 3 ? segments.slice(0, 2).join('-') : ticker;
}
