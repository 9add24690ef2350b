/**
 * Sports statistics types (ESPN scoreboard).
 */

export type TeamSide = 'away' | 'home';

export interface LeaderEntry {
  athlete: string;
  position: string | null;
  displayValue: string;
  value: number | null;
}

export interface LeaderCategory {
  name: string;
  displayName: string;
  /** Best first */
  leaders: LeaderEntry[];
}

export interface TeamLeaders {
  team: string;
  categories: LeaderCategory[];
}

export interface TeamScore {
  name: string;
  abbreviation: string;
  score: number | null;
  winner: boolean;
}

export interface GameResult {
  gameId: string;
  name: string;
  date: string | null;
  completed: boolean;
  state: string;
  description: string;
  away: TeamScore | null;
  home: TeamScore | null;
  winner: TeamSide | null;
  leaders: TeamLeaders[];
}

export type ConfidenceLevel =
  | 'very confident'
  | 'moderately confident'
  | 'uncertain'
  | 'doubtful'
  | 'very doubtful';

/** How a resolved game compares to the market's implied probability */
export type MarketVerdict =
  | { status: 'incomplete'; message: string }
  | {
      status: 'resolved';
      betWon: boolean;
      team: string;
      probability: number;
      confidence: ConfidenceLevel;
      actualWinner: string | null;
      finalScore: { away: number | null; home: number | null };
      message: string;
    };
