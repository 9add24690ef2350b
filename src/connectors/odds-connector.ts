/**
 * Odds Connector
 *
 * Fetches moneyline quotes from The Odds API (v4).
 *
 * Endpoint: GET /v4/sports/{sport}/odds?regions=us&markets=h2h&oddsFormat=american
 * Each event carries bookmakers[].markets[].outcomes[] with the team name
 * and American price. Outcomes that name neither team (draws in soccer)
 * are not moneyline quotes for a side and are skipped.
 */

import { z } from 'zod';
import { ODDS_API } from '../config/api.js';
import { fetchJson, parseResponse, withRetry } from '../helpers/helpers.js';
import { createLogger } from '../helpers/logger.js';
import type { FetchResult } from '../types/common.js';
import type { OddsMatchup, OddsQuote } from '../types/odds.js';

const log = createLogger('OddsAPI');

const OutcomeSchema = z.object({
  name: z.string(),
  price: z.number(),
});

const OddsEventSchema = z.object({
  id: z.string(),
  commence_time: z.string(),
  home_team: z.string(),
  away_team: z.string(),
  bookmakers: z
    .array(
      z.object({
        key: z.string(),
        title: z.string().optional(),
        markets: z.array(z.object({ key: z.string(), outcomes: z.array(OutcomeSchema).default([]) })).default([]),
      })
    )
    .default([]),
});

type OddsEvent = z.infer<typeof OddsEventSchema>;

export interface OddsConnector {
  /** Upcoming games of one sport with every bookmaker's moneyline */
  fetchOdds(sportKey: string): Promise<FetchResult<OddsMatchup>>;
}

/**
 * Flatten one feed event into an OddsMatchup.
 */
export function toOddsMatchup(event: OddsEvent): OddsMatchup {
  const sides = new Set([event.home_team, event.away_team]);
  const quotes: OddsQuote[] = [];

  for (const bookmaker of event.bookmakers) {
    const moneyline = bookmaker.markets.find((market) => market.key === ODDS_API.MARKETS);
    if (!moneyline) continue;

    for (const outcome of moneyline.outcomes) {
      if (!sides.has(outcome.name)) continue;
      quotes.push({ bookmaker: bookmaker.title ?? bookmaker.key, team: outcome.name, price: outcome.price });
    }
  }

  return {
    id: event.id,
    awayTeam: event.away_team,
    homeTeam: event.home_team,
    commenceTime: event.commence_time,
    quotes,
  };
}

export class TheOddsApiConnector implements OddsConnector {
  constructor(
    private readonly apiKey: string,
    private readonly baseUrl: string
  ) {}

  async fetchOdds(sportKey: string): Promise<FetchResult<OddsMatchup>> {
    const url = new URL(`${this.baseUrl.replace(/\/+$/, '')}/v4/sports/${encodeURIComponent(sportKey)}/odds`);
    url.searchParams.set('apiKey', this.apiKey);
    url.searchParams.set('regions', ODDS_API.REGIONS);
    url.searchParams.set('markets', ODDS_API.MARKETS);
    url.searchParams.set('oddsFormat', ODDS_API.ODDS_FORMAT);

    const body = parseResponse(
      z.array(z.unknown()),
      await withRetry(() => fetchJson(url, { platform: 'odds-api', timeoutMs: ODDS_API.TIMEOUT_MS })),
      'odds-api',
      'odds'
    );

    const errors: string[] = [];
    const data: OddsMatchup[] = [];
    body.forEach((entry, index) => {
      const parsed = OddsEventSchema.safeParse(entry);
      if (!parsed.success) {
        errors.push(`Skipped odds event #${index}: ${parsed.error.issues[0]?.message ?? 'invalid event'}`);
        return;
      }
      data.push(toOddsMatchup(parsed.data));
    });

    log.debug(`${sportKey}: fetched ${data.length} matchups`);
    return { data, errors, fetchedAt: new Date().toISOString() };
  }
}
