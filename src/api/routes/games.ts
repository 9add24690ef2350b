/**
 * Game Route
 *
 * GET /api/sports/:sport/games/:eventTicker - Game detail with consensus,
 * result and preview. `?summary=false` skips text generation.
 */

import { Router } from 'express';
import type { ExplorerService } from '../services/explorer.service.js';
import { GameQuerySchema, parseQuery } from './query.js';

export function createGamesRouter(explorer: ExplorerService): Router {
  const router = Router();

  router.get('/:sport/games/:eventTicker', async (req, res, next) => {
    try {
      const { summary } = parseQuery(GameQuerySchema, req.query);
      res.json(await explorer.getGame(req.params.sport, req.params.eventTicker, { summary }));
    } catch (error) {
      next(error);
    }
  });

  return router;
}
