/**
 * Game results from ESPN scoreboard events, and how they compare to the
 * market's implied probability.
 */

import { z } from 'zod';
import type { TeamRegistry } from '../matching/team-registry.js';
import type {
  ConfidenceLevel,
  GameResult,
  LeaderCategory,
  MarketVerdict,
  TeamLeaders,
  TeamScore,
  TeamSide,
} from '../types/stats.js';

// ============ Scoreboard Schemas ============

const LeaderSchema = z.object({
  displayValue: z.string().default(''),
  value: z.number().nullish(),
  athlete: z
    .object({
      displayName: z.string().optional(),
      fullName: z.string().optional(),
      position: z.object({ abbreviation: z.string().optional() }).nullish(),
    })
    .nullish(),
});

const LeaderCategorySchema = z.object({
  name: z.string(),
  displayName: z.string().optional(),
  leaders: z.array(LeaderSchema).default([]),
});

const CompetitorSchema = z.object({
  homeAway: z.string().optional(),
  score: z.union([z.string(), z.number()]).nullish(),
  winner: z.boolean().optional(),
  team: z
    .object({
      displayName: z.string().default(''),
      abbreviation: z.string().default(''),
    })
    .default({}),
  leaders: z.array(LeaderCategorySchema).default([]),
});

export const EspnEventSchema = z.object({
  id: z.string(),
  name: z.string().default(''),
  date: z.string().nullish(),
  status: z
    .object({
      type: z
        .object({
          completed: z.boolean().default(false),
          state: z.string().default(''),
          description: z.string().default(''),
        })
        .default({}),
    })
    .default({}),
  competitions: z.array(z.object({ competitors: z.array(CompetitorSchema).default([]) })).default([]),
});

export const EspnScoreboardSchema = z.object({
  events: z.array(z.unknown()).default([]),
});

export type EspnEvent = z.infer<typeof EspnEventSchema>;
export type EspnCompetitor = z.infer<typeof CompetitorSchema>;

// ============ Team Matching ============

function compactName(name: string): string {
  return name.toLowerCase().replace(/[^a-z0-9]/g, '');
}

/**
 * Whether an ESPN team name and a market team name denote the same team.
 *
 * Names are equal after dropping case, spaces and punctuation. With a
 * registry, names that resolve to the same canonical team also match, so
 * "NY Giants" meets "New York Giants". Shared nicknames alone never match
 * ("Manchester City" is not "Leicester City").
 */
export function teamNamesMatch(espnName: string, name: string, registry?: TeamRegistry): boolean {
  const a = compactName(espnName);
  const b = compactName(name);
  if (!a || !b) return false;
  if (a === b) return true;
  if (!registry) return false;

  const canonical = registry.resolve(espnName);
  return canonical !== null && canonical === registry.resolve(name);
}

function competitorsOf(event: EspnEvent): EspnCompetitor[] {
  return event.competitions[0]?.competitors ?? [];
}

function sideOf(event: EspnEvent, side: TeamSide): EspnCompetitor | undefined {
  return competitorsOf(event).find((competitor) => competitor.homeAway === side);
}

/**
 * Whether a scoreboard event is the given away/home pairing.
 */
export function isMatchingEvent(event: EspnEvent, away: string, home: string, registry?: TeamRegistry): boolean {
  if (competitorsOf(event).length !== 2) return false;
  const awayTeam = sideOf(event, 'away')?.team.displayName ?? '';
  const homeTeam = sideOf(event, 'home')?.team.displayName ?? '';
  return teamNamesMatch(awayTeam, away, registry) && teamNamesMatch(homeTeam, home, registry);
}

// ============ Extraction ============

function toScore(score: string | number | null | undefined): number | null {
  if (score === null || score === undefined || score === '') return null;
  const value = typeof score === 'number' ? score : Number(score);
  return Number.isFinite(value) ? value : null;
}

function toTeamScore(competitor: EspnCompetitor | undefined): TeamScore | null {
  if (!competitor) return null;
  return {
    name: competitor.team.displayName,
    abbreviation: competitor.team.abbreviation,
    score: toScore(competitor.score),
    winner: competitor.winner ?? false,
  };
}

/**
 * Ranked leaders per stat category for one competitor.
 *
 * @param categories Category names to keep; all when omitted
 */
export function extractTeamLeaders(competitor: EspnCompetitor, categories?: readonly string[]): TeamLeaders {
  const wanted = categories ? new Set(categories) : null;
  const result: LeaderCategory[] = [];

  for (const category of competitor.leaders) {
    if (wanted && !wanted.has(category.name)) continue;
    result.push({
      name: category.name,
      displayName: category.displayName ?? category.name,
      leaders: category.leaders.map((leader) => ({
        athlete: leader.athlete?.displayName ?? leader.athlete?.fullName ?? 'Unknown',
        position: leader.athlete?.position?.abbreviation ?? null,
        displayValue: leader.displayValue,
        value: leader.value ?? null,
      })),
    });
  }

  return { team: competitor.team.displayName, categories: result };
}

export function extractGameResult(event: EspnEvent, categories?: readonly string[]): GameResult {
  const away = toTeamScore(sideOf(event, 'away'));
  const home = toTeamScore(sideOf(event, 'home'));
  const { completed, state, description } = event.status.type;

  let winner: TeamSide | null = null;
  if (completed && away && home) {
    if (home.winner) winner = 'home';
    else if (away.winner) winner = 'away';
  }

  return {
    gameId: event.id,
    name: event.name,
    date: event.date ?? null,
    completed,
    state,
    description,
    away,
    home,
    winner,
    leaders: competitorsOf(event).map((competitor) => extractTeamLeaders(competitor, categories)),
  };
}

// ============ Market Comparison ============

function confidenceFor(pct: number): ConfidenceLevel {
  if (pct >= 75) return 'very confident';
  if (pct >= 60) return 'moderately confident';
  if (pct >= 40) return 'uncertain';
  if (pct >= 25) return 'doubtful';
  return 'very doubtful';
}

/**
 * Compare a finished game with the market price of one side.
 *
 * @param probability Implied probability (0-1) that `side` wins
 */
export function compareToMarket(result: GameResult, probability: number, side: TeamSide): MarketVerdict {
  if (!result.completed) {
    return { status: 'incomplete', message: 'Game has not finished yet' };
  }

  const betWon = result.winner === side;
  const team = result[side]?.name ?? 'Unknown';
  const pct = probability * 100;
  const shown = Math.round(pct);
  const confidence = confidenceFor(pct);

  let message: string;
  if (betWon) {
    message =
      pct >= 60
        ? `Market prediction correct. The market was ${confidence} (${shown}%) that ${team} would win, and they did.`
        : `Upset. Despite low odds (${shown}%), ${team} won.`;
  } else {
    message =
      pct >= 60
        ? `Market prediction wrong. The market was ${confidence} (${shown}%) that ${team} would win, but they lost.`
        : `Expected result. The market was ${confidence} (${shown}%) that ${team} would win, and they lost as predicted.`;
  }

  return {
    status: 'resolved',
    betWon,
    team,
    probability,
    confidence,
    actualWinner: result.winner ? (result[result.winner]?.name ?? null) : null,
    finalScore: { away: result.away?.score ?? null, home: result.home?.score ?? null },
    message,
  };
}
