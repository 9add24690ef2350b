/**
 * Normalized Market Model
 *
 * Display-ready records derived from Kalshi contracts. All probabilities
 * are on a 0-1 scale. `null` always means "no data", never zero.
 */

/** Sentinel matchup for contracts that are not about one game */
export const GENERAL_MATCHUP = 'General';

/** Ordered pair of canonical team names: away first, home second */
export type Matchup = readonly [away: string, home: string];

export type MatchupOrGeneral = Matchup | typeof GENERAL_MATCHUP;

/** Price fields in the order they are consulted */
export type ProbabilityField = 'yes_bid' | 'last_price' | 'midpoint';

export interface NormalizedMarket {
  /** Source market ticker, kept for traceability */
  ticker: string;

  /** Parent event grouping the opposing contracts of one game */
  eventTicker: string;

  /** Human category, e.g. "Games" or "Passing Yards" */
  category: string;

  matchup: MatchupOrGeneral;

  displayName: string;

  /** Canonical name of the team the YES side pays out on */
  subjectTeam: string | null;

  /** Implied probability of YES, from exactly one price field */
  probability: number | null;

  /** Which price field produced `probability` */
  probabilitySource: ProbabilityField | null;

  /** Best YES bid in dollars (0-1) */
  yesBid: number | null;

  /** Best YES ask in dollars (0-1) */
  yesAsk: number | null;

  volume: number | null;

  openInterest: number | null;

  /** Game date from the ticker, YYYY-MM-DD */
  gameDate: string | null;

  /** ISO 8601 close time */
  closeTime: string | null;
}

export interface MarketSide {
  team: string;
  probability: number | null;
  ticker: string;
  /** YES quotes of this side's own contract, in dollars */
  bid: number | null;
  ask: number | null;
  /**
   * NO quotes for this side: the complement of the opposing contract's
   * YES ask and bid, or of this contract's own when the opponent has none.
   */
  noBid: number | null;
  noAsk: number | null;
}

/** Two opposing contracts of one game merged into one record */
export interface CombinedMarket {
  kind: 'combined';
  eventTicker: string;
  category: string;
  matchup: MatchupOrGeneral;
  displayName: string;
  away: MarketSide;
  home: MarketSide;
  /** Larger of the two contract volumes */
  volume: number | null;
  openInterest: number | null;
  gameDate: string | null;
  closeTime: string | null;
}

/** A contract whose parent event could not be paired */
export interface SingleSidedMarket {
  kind: 'single';
  eventTicker: string;
  market: NormalizedMarket;
}

export type PairedMarket = CombinedMarket | SingleSidedMarket;

export function isCombinedMarket(market: PairedMarket): market is CombinedMarket {
  return market.kind === 'combined';
}
