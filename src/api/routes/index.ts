/**
 * Route Aggregator
 *
 * Combines all API routes.
 */

import { Router } from 'express';
import type { ExplorerService } from '../services/explorer.service.js';
import { createGamesRouter } from './games.js';
import { createHealthRouter } from './health.js';
import { createMarketsRouter } from './markets.js';
import { createOddsRouter } from './odds.js';

export function createRoutes(explorer: ExplorerService): Router {
  const router = Router();

  router.use('/health', createHealthRouter());
  router.use('/sports', createMarketsRouter(explorer), createOddsRouter(explorer), createGamesRouter(explorer));

  return router;
}
