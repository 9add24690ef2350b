/**
 * Text-generation capability used for game previews.
 */

import type { TeamLeaders } from '../types/stats.js';

export interface SummaryContext {
  /** Display name of the sport, e.g. "NFL" */
  sport: string;
  away: string;
  home: string;
  /** Market probability that the away side wins (0-1) */
  marketProbability: number | null;
  /** Sportsbook consensus probability for the same side (0-1) */
  sportsbookProbability: number | null;
  volume: number | null;
  gameDate: string | null;
  leaders: TeamLeaders[];
}

export interface SummaryProvider {
  readonly name: 'gemini' | 'openai';

  /**
   * Generate a short preview.
   *
   * @throws ProviderError when the provider fails or returns nothing
   */
  summarize(context: SummaryContext): Promise<string>;
}

export interface Summary {
  text: string;
  source: SummaryProvider['name'] | 'fallback';
}
