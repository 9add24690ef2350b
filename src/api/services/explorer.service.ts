/**
 * Explorer Service
 *
 * Orchestrates the market pipeline per sport: fetch -> normalize -> pair,
 * then search, pagination and the game detail join (sportsbook consensus,
 * result, leaders, summary).
 *
 * Listings are cached per sport for the configured TTL; concurrent
 * refreshes of one sport share a single upstream fetch.
 */

import type { Summarizer } from '../../ai/summarizer.js';
import type { Summary, SummaryContext } from '../../ai/types.js';
import { EXPLORER, KALSHI } from '../../config/api.js';
import { isSport, type Sport, type SportConfig } from '../../config/sports.js';
import type { HistoryOptions, KalshiConnector } from '../../connectors/kalshi-connector.js';
import type { OddsConnector } from '../../connectors/odds-connector.js';
import { NotFoundError, getErrorMessage } from '../../errors/index.js';
import { createLogger } from '../../helpers/logger.js';
import { TtlCache } from '../../helpers/ttl-cache.js';
import { normalizeMarket, normalizeMarkets } from '../../markets/normalizer.js';
import { combinePairs } from '../../markets/pairer.js';
import { classifyProbability, type ProbabilitySignal } from '../../markets/signals.js';
import { parseTicker } from '../../matching/kalshi/ticker-parser.js';
import { aggregateMatchup, consensusFor } from '../../odds/consensus.js';
import type { StatsConnector } from '../../stats/espn-connector.js';
import { compareToMarket } from '../../stats/game-result.js';
import type { Candlestick, OrderBook } from '../../types/kalshi.js';
import {
  GENERAL_MATCHUP,
  isCombinedMarket,
  type Matchup,
  type NormalizedMarket,
  type PairedMarket,
} from '../../types/markets.js';
import type { MatchupConsensus, OddsMatchup, TeamConsensus } from '../../types/odds.js';
import type { GameResult, MarketVerdict, TeamLeaders, TeamSide } from '../../types/stats.js';
import type { Page } from '../../types/common.js';

const log = createLogger('Explorer');

// ============ Types ============

export interface ExplorerDeps {
  sports: ReadonlyMap<Sport, SportConfig>;
  kalshi: KalshiConnector;
  /** null when no odds API key is configured */
  odds: OddsConnector | null;
  stats: StatsConnector;
  summarizer: Summarizer;
  cacheTtlMs: number;
  now?: () => number;
}

export interface SportInfo {
  sport: Sport;
  displayName: string;
  categories: string[];
}

export interface SportListing {
  sport: Sport;
  markets: PairedMarket[];
  categories: string[];
  errors: string[];
  fetchedAt: string;
}

export interface MarketQuery {
  page?: number;
  pageSize?: number;
  search?: string;
  category?: string;
  refresh?: boolean;
}

export interface MarketsPage extends Page<PairedMarket> {
  sport: Sport;
  categories: string[];
  fetchedAt: string;
}

export interface MarketDetail {
  market: NormalizedMarket;
  status: string | null;
  signal: ProbabilitySignal;
  url: string;
}

export interface OddsOverview {
  sport: Sport;
  enabled: boolean;
  matchups: MatchupConsensus[];
  errors: string[];
  fetchedAt: string | null;
}

export interface GameConsensus {
  matchup: OddsMatchup;
  away: TeamConsensus | null;
  home: TeamConsensus | null;
}

export interface GameDetail {
  sport: Sport;
  eventTicker: string;
  market: PairedMarket;
  matchup: Matchup | null;
  signals: { away: ProbabilitySignal; home: ProbabilitySignal };
  consensus: GameConsensus | null;
  result: GameResult | null;
  verdict: MarketVerdict | null;
  leaders: TeamLeaders[];
  summary: Summary | null;
}

interface OddsSnapshot {
  matchups: OddsMatchup[];
  errors: string[];
  fetchedAt: string;
}

/** Per-side view of a paired or single-sided market */
interface GameSides {
  matchup: Matchup | null;
  away: number | null;
  home: number | null;
  volume: number | null;
  when: string | null;
}

// ============ Market Accessors ============

function categoryOf(market: PairedMarket): string {
  return isCombinedMarket(market) ? market.category : market.market.category;
}

function searchableText(market: PairedMarket): string {
  const parts = isCombinedMarket(market)
    ? [market.displayName, market.eventTicker, market.away.team, market.home.team, market.away.ticker, market.home.ticker]
    : [market.market.displayName, market.eventTicker, market.market.ticker, market.market.subjectTeam ?? ''];
  const matchup = isCombinedMarket(market) ? market.matchup : market.market.matchup;
  if (matchup !== GENERAL_MATCHUP) parts.push(...matchup);
  return parts.join(' ').toLowerCase();
}

function distinct(values: readonly string[]): string[] {
  return [...new Set(values)];
}

function sidesOf(market: PairedMarket): GameSides {
  if (isCombinedMarket(market)) {
    return {
      matchup: market.matchup === GENERAL_MATCHUP ? null : market.matchup,
      away: market.away.probability,
      home: market.home.probability,
      volume: market.volume,
      when: market.closeTime ?? market.gameDate,
    };
  }

  const single = market.market;
  const matchup = single.matchup === GENERAL_MATCHUP ? null : single.matchup;
  const isHome = matchup !== null && single.subjectTeam === matchup[1];
  return {
    matchup,
    away: isHome ? null : single.probability,
    home: isHome ? single.probability : null,
    volume: single.volume,
    when: single.closeTime ?? single.gameDate,
  };
}

/** The side the market favours, away on ties; null without any price */
function favouredSide(sides: GameSides): { side: TeamSide; probability: number } | null {
  if (sides.away !== null && (sides.home === null || sides.away >= sides.home)) {
    return { side: 'away', probability: sides.away };
  }
  if (sides.home !== null) return { side: 'home', probability: sides.home };
  return null;
}

// ============ Service ============

export class ExplorerService {
  private readonly listings: TtlCache<Sport, SportListing>;
  private readonly oddsCache: TtlCache<Sport, OddsSnapshot>;
  private readonly now: () => number;

  constructor(private readonly deps: ExplorerDeps) {
    this.now = deps.now ?? Date.now;
    this.listings = new TtlCache(deps.cacheTtlMs, this.now);
    this.oddsCache = new TtlCache(deps.cacheTtlMs, this.now);
  }

  /**
   * Configuration of a sport named in a request.
   *
   * @throws NotFoundError for unsupported sports
   */
  config(sport: string): SportConfig {
    const key = sport.toLowerCase();
    const config = isSport(key) ? this.deps.sports.get(key) : undefined;
    if (!config) throw new NotFoundError('sport', sport);
    return config;
  }

  get summaryProviders(): string[] {
    return this.deps.summarizer.providerNames;
  }

  listSports(): SportInfo[] {
    return [...this.deps.sports.values()].map((config) => ({
      sport: config.sport,
      displayName: config.displayName,
      categories: distinct(Object.values(config.categories)),
    }));
  }

  async getListing(sport: string, forceRefresh = false): Promise<SportListing> {
    const config = this.config(sport);
    return this.listings.getOrLoad(config.sport, () => this.loadListing(config), forceRefresh);
  }

  private async loadListing(config: SportConfig): Promise<SportListing> {
    const startTime = this.now();
    const raw = await this.deps.kalshi.fetchMarkets(config.kalshiSeries);
    const markets = combinePairs(normalizeMarkets(raw.data, config));

    log.info(
      `${config.displayName}: ${raw.data.length} contracts -> ${markets.length} markets in ${this.now() - startTime}ms`
    );

    return {
      sport: config.sport,
      markets,
      categories: distinct(markets.map(categoryOf)),
      errors: raw.errors,
      fetchedAt: raw.fetchedAt,
    };
  }

  async listMarkets(sport: string, query: MarketQuery = {}): Promise<MarketsPage> {
    const listing = await this.getListing(sport, query.refresh ?? false);
    const search = query.search?.trim().toLowerCase() ?? '';
    const category = query.category?.trim().toLowerCase() ?? '';

    const filtered = listing.markets.filter(
      (market) =>
        (!category || categoryOf(market).toLowerCase() === category) &&
        (!search || searchableText(market).includes(search))
    );

    const pageSize = Math.min(Math.max(query.pageSize ?? EXPLORER.DEFAULT_PAGE_SIZE, 1), EXPLORER.MAX_PAGE_SIZE);
    const page = Math.max(query.page ?? 1, 1);
    const start = (page - 1) * pageSize;

    return {
      sport: listing.sport,
      items: filtered.slice(start, start + pageSize),
      page,
      pageSize,
      total: filtered.length,
      totalPages: Math.max(1, Math.ceil(filtered.length / pageSize)),
      categories: listing.categories,
      fetchedAt: listing.fetchedAt,
    };
  }

  async getMarket(sport: string, ticker: string): Promise<MarketDetail> {
    const config = this.config(sport);
    const raw = await this.deps.kalshi.fetchMarket(ticker.toUpperCase());
    if (!raw) throw new NotFoundError('market', ticker);

    const market = normalizeMarket(raw, config);
    return {
      market,
      status: raw.status ?? null,
      signal: classifyProbability(market.probability),
      url: `${KALSHI.WEB_URL}/markets/${market.eventTicker.toLowerCase()}`,
    };
  }

  async getHistory(sport: string, ticker: string, options: Partial<HistoryOptions> = {}): Promise<Candlestick[]> {
    const config = this.config(sport);
    const upper = ticker.toUpperCase();
    const series = parseTicker(upper, config)?.seriesTicker ?? config.kalshiSeries;
    return this.deps.kalshi.fetchHistory(series, upper, {
      days: options.days ?? KALSHI.DEFAULT_HISTORY_DAYS,
      interval: options.interval ?? KALSHI.DEFAULT_HISTORY_INTERVAL,
    });
  }

  async getOrderBook(sport: string, ticker: string): Promise<OrderBook> {
    this.config(sport);
    return this.deps.kalshi.fetchOrderBook(ticker.toUpperCase());
  }

  private loadOdds(config: SportConfig, odds: OddsConnector, forceRefresh: boolean): Promise<OddsSnapshot> {
    return this.oddsCache.getOrLoad(
      config.sport,
      async () => {
        const result = await odds.fetchOdds(config.oddsApiKey);
        return { matchups: result.data, errors: result.errors, fetchedAt: result.fetchedAt };
      },
      forceRefresh
    );
  }

  async getOdds(sport: string, forceRefresh = false): Promise<OddsOverview> {
    const config = this.config(sport);
    const odds = this.deps.odds;
    if (!odds) {
      return { sport: config.sport, enabled: false, matchups: [], errors: [], fetchedAt: null };
    }

    const snapshot = await this.loadOdds(config, odds, forceRefresh);
    return {
      sport: config.sport,
      enabled: true,
      matchups: snapshot.matchups.map(aggregateMatchup),
      errors: snapshot.errors,
      fetchedAt: snapshot.fetchedAt,
    };
  }

  /**
   * Sportsbook consensus for one game, matched through the team registry
   * so feed names like "LA Chargers" meet canonical market names.
   */
  private async findConsensus(config: SportConfig, matchup: Matchup): Promise<GameConsensus | null> {
    const odds = this.deps.odds;
    if (!odds) return null;

    let snapshot: OddsSnapshot;
    try {
      snapshot = await this.loadOdds(config, odds, false);
    } catch (error) {
      log.warn(`Odds unavailable for ${config.displayName}: ${getErrorMessage(error)}`);
      return null;
    }

    const { registry } = config;
    const [away, home] = matchup;
    const teams = new Set([away, home]);
    const found = snapshot.matchups.find((entry) => {
      const a = registry.resolve(entry.awayTeam);
      const h = registry.resolve(entry.homeTeam);
      return a !== null && h !== null && a !== h && teams.has(a) && teams.has(h);
    });
    if (!found) return null;

    const { consensus } = aggregateMatchup(found);
    const sideFor = (team: string): TeamConsensus | null => {
      const feedName = [found.awayTeam, found.homeTeam].find((name) => registry.resolve(name) === team);
      return feedName === undefined ? null : consensusFor(consensus, feedName);
    };
    return { matchup: found, away: sideFor(away), home: sideFor(home) };
  }

  private async findResult(config: SportConfig, matchup: Matchup, when: string | null): Promise<GameResult | null> {
    const near = when ? new Date(when) : new Date(this.now());
    if (Number.isNaN(near.getTime())) return null;

    try {
      return await this.deps.stats.findGameResult({
        espnPath: config.espnPath,
        away: matchup[0],
        home: matchup[1],
        near,
        statCategories: config.statCategories,
        registry: config.registry,
      });
    } catch (error) {
      log.warn(`Stats unavailable for ${matchup[0]} at ${matchup[1]}: ${getErrorMessage(error)}`);
      return null;
    }
  }

  async getGame(sport: string, eventTicker: string, options: { summary?: boolean } = {}): Promise<GameDetail> {
    const config = this.config(sport);
    const listing = await this.getListing(config.sport);
    const wanted = eventTicker.toUpperCase();

    const market =
      listing.markets.find((entry) => isCombinedMarket(entry) && entry.eventTicker === wanted) ??
      listing.markets.find((entry) => entry.eventTicker === wanted);
    if (!market) throw new NotFoundError('event', eventTicker);

    const sides = sidesOf(market);
    const { matchup } = sides;

    let consensus: GameConsensus | null = null;
    let result: GameResult | null = null;
    if (matchup) {
      [consensus, result] = await Promise.all([
        this.findConsensus(config, matchup),
        this.findResult(config, matchup, sides.when),
      ]);
    }

    const favoured = favouredSide(sides);
    const verdict = result && favoured ? compareToMarket(result, favoured.probability, favoured.side) : null;

    let summary: Summary | null = null;
    if (matchup && options.summary !== false) {
      const context: SummaryContext = {
        sport: config.displayName,
        away: matchup[0],
        home: matchup[1],
        marketProbability: sides.away,
        sportsbookProbability: consensus?.away?.consensusProbability ?? null,
        volume: sides.volume,
        gameDate: isCombinedMarket(market) ? market.gameDate : market.market.gameDate,
        leaders: result?.leaders ?? [],
      };
      summary = await this.deps.summarizer.summarize(context);
    }

    return {
      sport: config.sport,
      eventTicker: market.eventTicker,
      market,
      matchup,
      signals: { away: classifyProbability(sides.away), home: classifyProbability(sides.home) },
      consensus,
      result,
      verdict,
      leaders: result?.leaders ?? [],
      summary,
    };
  }
}
