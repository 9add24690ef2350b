/**
 * Sportsbook Odds Types
 */

/** One bookmaker's moneyline price for one team */
export interface OddsQuote {
  bookmaker: string;
  team: string;
  /** American odds, e.g. -150 or +200 */
  price: number;
}

/** One game on the odds feed with every bookmaker's moneyline quotes */
export interface OddsMatchup {
  id: string;
  awayTeam: string;
  homeTeam: string;
  /** ISO 8601 start time */
  commenceTime: string;
  quotes: OddsQuote[];
}

export interface BestPrice {
  price: number;
  bookmaker: string;
  /** Payout per unit stake, stake included */
  decimalOdds: number;
}

export interface TeamConsensus {
  team: string;
  /** Mean implied probability across accepted quotes */
  consensusProbability: number;
  quoteCount: number;
  bestPrice: BestPrice;
}

export interface RejectedQuote {
  quote: OddsQuote;
  reason: string;
}

export interface ConsensusOdds {
  teams: TeamConsensus[];
  rejected: RejectedQuote[];
}

export interface MatchupConsensus {
  matchup: OddsMatchup;
  consensus: ConsensusOdds;
  away: TeamConsensus | null;
  home: TeamConsensus | null;
}
