/**
 * API Configuration
 *
 * Centralized configuration for all external API endpoints,
 * timeouts, and request parameters.
 */

// ============ Kalshi ============

export const KALSHI = {
  /** Public trade API (unauthenticated market data) */
  API_URL: 'https://api.elections.kalshi.com/trade-api/v2',

  /** Web front end, for deep links */
  WEB_URL: 'https://kalshi.com',

  /** Maximum markets per page */
  PAGE_LIMIT: 200,

  /** Safety cap on cursor pages per listing */
  MAX_PAGES: 20,

  /** Request timeout in milliseconds */
  TIMEOUT_MS: 20_000,

  /** Candlestick period in minutes (1, 60 or 1440) */
  DEFAULT_HISTORY_INTERVAL: 60,

  /** Days of price history to request by default */
  DEFAULT_HISTORY_DAYS: 7,
} as const;

// ============ The Odds API ============

export const ODDS_API = {
  /** Bookmaker region */
  REGIONS: 'us',

  /** Moneyline only */
  MARKETS: 'h2h',

  ODDS_FORMAT: 'american',

  /** Request timeout in milliseconds */
  TIMEOUT_MS: 10_000,
} as const;

// ============ ESPN ============

export const ESPN = {
  /** Unofficial site API */
  API_URL: 'https://site.api.espn.com/apis/site/v2/sports',

  /** Days around the market close date searched for a game */
  SEARCH_DAY_OFFSETS: [0, -1, 1, -2, 2],

  /** Request timeout in milliseconds */
  TIMEOUT_MS: 10_000,
} as const;

// ============ Text Generation ============

export const AI = {
  OPENAI_API_URL: 'https://api.openai.com/v1/chat/completions',

  /** Upper bound on generated preview length */
  MAX_OUTPUT_TOKENS: 180,

  /** Low temperature keeps the model close to the provided numbers */
  TEMPERATURE: 0.2,

  /** Request timeout in milliseconds */
  TIMEOUT_MS: 30_000,
} as const;

// ============ Retry ============

export const RETRY = {
  /** Attempts per request when rate limited */
  MAX_RETRIES: 3,

  /** First backoff delay; doubles per attempt */
  BASE_DELAY_MS: 100,
} as const;

// ============ Explorer ============

export const EXPLORER = {
  /** Games per page when the client does not ask */
  DEFAULT_PAGE_SIZE: 12,

  /** Largest page a client may request */
  MAX_PAGE_SIZE: 100,
} as const;
