/**
 * ESPN Stats Connector
 *
 * Looks up games on ESPN's unofficial scoreboard API. Kalshi close times
 * drift from the actual kickoff (time zones, reschedules), so the search
 * walks the close date and the two days either side of it.
 */

import { ESPN } from '../config/api.js';
import { getErrorMessage } from '../errors/index.js';
import { fetchJson, parseResponse, withRetry } from '../helpers/helpers.js';
import { createLogger } from '../helpers/logger.js';
import type { TeamRegistry } from '../matching/team-registry.js';
import type { GameResult } from '../types/stats.js';
import {
  EspnEventSchema,
  EspnScoreboardSchema,
  extractGameResult,
  isMatchingEvent,
  type EspnEvent,
} from './game-result.js';

const log = createLogger('ESPN');

const DAY_MS = 86_400_000;

export interface GameLookup {
  /** ESPN "{sport}/{league}" path, e.g. "football/nfl" */
  espnPath: string;
  away: string;
  home: string;
  /** Approximate game time, usually the market close time */
  near: Date;
  /** Leader categories to keep */
  statCategories?: readonly string[];
  /** Resolves ESPN spellings to the sport's canonical team names */
  registry?: TeamRegistry;
}

export interface StatsConnector {
  findGameResult(lookup: GameLookup): Promise<GameResult | null>;
}

/** YYYYMMDD in UTC, the scoreboard `dates` format */
export function toEspnDate(date: Date): string {
  return date.toISOString().slice(0, 10).replace(/-/g, '');
}

export class EspnConnector implements StatsConnector {
  constructor(private readonly baseUrl: string = ESPN.API_URL) {}

  async fetchScoreboard(espnPath: string, date: string): Promise<EspnEvent[]> {
    const url = new URL(`${this.baseUrl}/${espnPath}/scoreboard`);
    url.searchParams.set('dates', date);

    const body = parseResponse(
      EspnScoreboardSchema,
      await withRetry(() => fetchJson(url, { platform: 'espn', timeoutMs: ESPN.TIMEOUT_MS })),
      'espn',
      'scoreboard'
    );

    const events: EspnEvent[] = [];
    for (const entry of body.events) {
      const parsed = EspnEventSchema.safeParse(entry);
      if (parsed.success) events.push(parsed.data);
    }
    return events;
  }

  async findGameResult(lookup: GameLookup): Promise<GameResult | null> {
    const { espnPath, away, home, near, statCategories, registry } = lookup;

    for (const offset of ESPN.SEARCH_DAY_OFFSETS) {
      const date = toEspnDate(new Date(near.getTime() + offset * DAY_MS));

      let events: EspnEvent[];
      try {
        events = await this.fetchScoreboard(espnPath, date);
      } catch (error) {
        log.warn(`Scoreboard ${espnPath} ${date} unavailable: ${getErrorMessage(error)}`);
        continue;
      }

      const match = events.find((event) => isMatchingEvent(event, away, home, registry));
      if (match) {
        log.debug(`Found ${away} at ${home} on ${date}`);
        return extractGameResult(match, statCategories);
      }
    }

    log.info(`No game found for ${away} at ${home} near ${toEspnDate(near)}`);
    return null;
  }
}
