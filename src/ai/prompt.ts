import { formatPercent } from '../markets/signals.js';
import type { SummaryContext } from './types.js';

const MAX_LEADERS_PER_TEAM = 3;

function leaderLines(context: SummaryContext): string[] {
  const lines: string[] = [];
  for (const team of context.leaders) {
    const names = team.categories
      .flatMap((category) =>
        category.leaders.slice(0, 1).map((leader) => `${leader.athlete} (${category.displayName} ${leader.displayValue})`)
      )
      .slice(0, MAX_LEADERS_PER_TEAM);
    if (names.length > 0) lines.push(`${team.team} leaders: ${names.join(', ')}`);
  }
  return lines;
}

/**
 * Facts handed to the model, one per line. Only known values are listed.
 */
export function buildContextLines(context: SummaryContext): string[] {
  const lines = [`${context.sport} matchup: ${context.away} at ${context.home}`];
  if (context.gameDate) lines.push(`Game date: ${context.gameDate}`);
  if (context.marketProbability !== null) {
    lines.push(`Prediction market probability (${context.away}): ${formatPercent(context.marketProbability)}`);
  }
  if (context.sportsbookProbability !== null) {
    lines.push(`Sportsbook consensus (${context.away}): ${formatPercent(context.sportsbookProbability)}`);
  }
  if (context.volume !== null) lines.push(`Contracts traded: ${context.volume.toLocaleString('en-US')}`);
  return [...lines, ...leaderLines(context)];
}

export const SYSTEM_PROMPT = 'You are a concise sports market analyst. Be precise and do not invent numbers.';

export function buildPrompt(context: SummaryContext): string {
  return [
    `Write a game preview of at most 80 words for this ${context.sport} matchup.`,
    'State the matchup, put the market and sportsbook probabilities in context, and name players to watch if leaders are given.',
    'Use only the facts below. Neutral tone.',
    '',
    ...buildContextLines(context),
  ].join('\n');
}
