/**
 * Sport Configuration
 *
 * One immutable `SportConfig` per supported sport, built once at start-up
 * from the team rosters under `data/teams/` and passed explicitly to the
 * parser, normalizer and connectors.
 */

import { readFileSync } from 'fs';
import { join } from 'path';
import { z } from 'zod';
import { DataValidationError, getErrorMessage } from '../errors/index.js';
import { TeamRegistry, type TeamEntry } from '../matching/team-registry.js';

export const SPORTS = ['nfl', 'nba', 'nhl', 'soccer'] as const;

export type Sport = (typeof SPORTS)[number];

export interface SportConfig {
  sport: Sport;
  displayName: string;

  /** Kalshi series listing the game-winner contracts */
  kalshiSeries: string;

  /** Leading token shared by every ticker of this sport, e.g. "KXNFL" */
  tickerPrefix: string;

  /** Ticker category code -> human category */
  categories: Readonly<Record<string, string>>;

  /** The Odds API sport key */
  oddsApiKey: string;

  /** ESPN "{sport}/{league}" path segment */
  espnPath: string;

  /** Stat categories shown for team leaders */
  statCategories: readonly string[];

  registry: TeamRegistry;
}

type SportDefinition = Omit<SportConfig, 'registry'>;

const GAME_CATEGORIES = {
  GAME: 'Games',
  SPREAD: 'Spreads',
  TOTAL: 'Totals',
} as const;

const SPORT_DEFINITIONS: Record<Sport, SportDefinition> = {
  nfl: {
    sport: 'nfl',
    displayName: 'NFL',
    kalshiSeries: 'KXNFLGAME',
    tickerPrefix: 'KXNFL',
    categories: {
      ...GAME_CATEGORIES,
      PASSYDS: 'Passing Yards',
      RUSHYDS: 'Rushing Yards',
      RECYDS: 'Receiving Yards',
      ANYTD: 'Anytime Touchdown',
      FIRSTTD: 'First Touchdown',
    },
    oddsApiKey: 'americanfootball_nfl',
    espnPath: 'football/nfl',
    statCategories: ['passingYards', 'rushingYards', 'receivingYards'],
  },
  nba: {
    sport: 'nba',
    displayName: 'NBA',
    kalshiSeries: 'KXNBAGAME',
    tickerPrefix: 'KXNBA',
    categories: {
      ...GAME_CATEGORIES,
      PTS: 'Points',
      REB: 'Rebounds',
      AST: 'Assists',
      '3PT': 'Three Pointers',
    },
    oddsApiKey: 'basketball_nba',
    espnPath: 'basketball/nba',
    statCategories: ['points', 'rebounds', 'assists'],
  },
  nhl: {
    sport: 'nhl',
    displayName: 'NHL',
    kalshiSeries: 'KXNHLGAME',
    tickerPrefix: 'KXNHL',
    categories: {
      ...GAME_CATEGORIES,
      GOAL: 'Goals',
      PTS: 'Points',
    },
    oddsApiKey: 'icehockey_nhl',
    espnPath: 'hockey/nhl',
    statCategories: ['goals', 'assists', 'points'],
  },
  soccer: {
    sport: 'soccer',
    displayName: 'Soccer',
    kalshiSeries: 'KXEPLGAME',
    tickerPrefix: 'KXEPL',
    categories: {
      ...GAME_CATEGORIES,
      BTTS: 'Both Teams to Score',
    },
    oddsApiKey: 'soccer_epl',
    espnPath: 'soccer/eng.1',
    statCategories: ['goals', 'assists', 'saves'],
  },
};

const TeamEntriesSchema = z.array(
  z.object({
    name: z.string().min(1),
    abbr: z.string().min(1),
    variations: z.array(z.string().min(1)),
  })
);

const TEAMS_DIR = join(__dirname, '..', '..', 'data', 'teams');

export function isSport(value: string): value is Sport {
  return SPORTS.some((sport) => sport === value);
}

/**
 * Read and validate the roster for one sport.
 */
export function loadTeams(sport: Sport, teamsDir: string = TEAMS_DIR): TeamEntry[] {
  const path = join(teamsDir, `${sport}.json`);
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (error) {
    throw new DataValidationError(`Cannot read team roster ${path}: ${getErrorMessage(error)}`, 'teams', {
      sport,
    });
  }

  const parsed = TeamEntriesSchema.safeParse(raw);
  if (!parsed.success) {
    throw new DataValidationError(`Invalid team roster ${path}: ${parsed.error.message}`, 'teams', { sport });
  }
  return parsed.data;
}

export function buildSportConfig(sport: Sport, teams: readonly TeamEntry[] = loadTeams(sport)): SportConfig {
  return Object.freeze({
    ...SPORT_DEFINITIONS[sport],
    registry: new TeamRegistry(sport, teams),
  });
}

/**
 * Build the configuration of every supported sport.
 */
export function buildSportConfigs(): ReadonlyMap<Sport, SportConfig> {
  return new Map(SPORTS.map((sport) => [sport, buildSportConfig(sport)] as const));
}
