/**
 * Market Lens API Server
 *
 * Express server for the sports market explorer.
 */

import express, { type Express } from 'express';
import cors from 'cors';
import { GeminiProvider } from '../ai/gemini-provider.js';
import { OpenAIProvider } from '../ai/openai-provider.js';
import { Summarizer } from '../ai/summarizer.js';
import type { SummaryProvider } from '../ai/types.js';
import { getEnv, type AppEnv } from '../config/env.js';
import { buildSportConfigs } from '../config/sports.js';
import { KalshiRestConnector } from '../connectors/kalshi-connector.js';
import { TheOddsApiConnector } from '../connectors/odds-connector.js';
import { createLogger, setLogLevel } from '../helpers/logger.js';
import { EspnConnector } from '../stats/espn-connector.js';
import { errorHandler, notFoundHandler } from './middleware/error-handler.js';
import { createRoutes } from './routes/index.js';
import { ExplorerService } from './services/explorer.service.js';

const log = createLogger('Server');

/**
 * Wire the explorer with live connectors from the environment.
 * Providers and the odds feed are left out when their key is missing.
 */
export function createExplorer(env: AppEnv): ExplorerService {
  const providers: SummaryProvider[] = [];
  if (env.GEMINI_API_KEY) providers.push(GeminiProvider.fromApiKey(env.GEMINI_API_KEY, env.GEMINI_MODEL));
  if (env.OPENAI_API_KEY) providers.push(new OpenAIProvider(env.OPENAI_API_KEY, env.OPENAI_MODEL));

  return new ExplorerService({
    sports: buildSportConfigs(),
    kalshi: new KalshiRestConnector(),
    odds: env.ODDS_API_KEY ? new TheOddsApiConnector(env.ODDS_API_KEY, env.ODDS_API_BASE_URL) : null,
    stats: new EspnConnector(),
    summarizer: new Summarizer(providers),
    cacheTtlMs: env.CACHE_TTL_MS,
  });
}

export function createApp(explorer: ExplorerService): Express {
  const app = express();

  // Middleware
  app.use(cors());
  app.use(express.json());

  // Request logging
  app.use((req, _res, next) => {
    log.info(`${req.method} ${req.path}`);
    next();
  });

  // Routes
  app.use('/api', createRoutes(explorer));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}

function start(): void {
  const env = getEnv();
  setLogLevel(env.LOG_LEVEL);

  const explorer = createExplorer(env);
  const app = createApp(explorer);

  app.listen(env.PORT, () => {
    log.info(`Market Lens API running on http://localhost:${env.PORT}`);
    log.info(`Odds feed ${env.ODDS_API_KEY ? 'enabled' : 'disabled'}; summary providers: ${explorer.summaryProviders.join(', ') || 'none'}`);
    console.log('');
    console.log('Available endpoints:');
    console.log('  GET /api/health                                 - Health check');
    console.log('  GET /api/sports                                 - Supported sports');
    console.log('  GET /api/sports/:sport/markets                  - Paginated markets');
    console.log('  GET /api/sports/:sport/markets/:ticker          - Market detail');
    console.log('  GET /api/sports/:sport/markets/:ticker/history  - Price history');
    console.log('  GET /api/sports/:sport/markets/:ticker/orderbook - Order book');
    console.log('  GET /api/sports/:sport/odds                     - Sportsbook consensus');
    console.log('  GET /api/sports/:sport/games/:eventTicker       - Game detail');
    console.log('');
  });
}

if (require.main === module) {
  start();
}
