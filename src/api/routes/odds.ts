/**
 * Odds Route
 *
 * GET /api/sports/:sport/odds - Sportsbook consensus per matchup
 */

import { Router } from 'express';
import type { ExplorerService } from '../services/explorer.service.js';
import { RefreshQuerySchema, parseQuery } from './query.js';

export function createOddsRouter(explorer: ExplorerService): Router {
  const router = Router();

  router.get('/:sport/odds', async (req, res, next) => {
    try {
      const { refresh } = parseQuery(RefreshQuerySchema, req.query);
      res.json(await explorer.getOdds(req.params.sport, refresh ?? false));
    } catch (error) {
      next(error);
    }
  });

  return router;
}
