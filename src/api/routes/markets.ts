/**
 * Market Routes
 *
 * GET /api/sports                                       - Supported sports
 * GET /api/sports/:sport/markets                        - Paginated markets
 * GET /api/sports/:sport/markets/:ticker                - Market detail
 * GET /api/sports/:sport/markets/:ticker/history        - Price history
 * GET /api/sports/:sport/markets/:ticker/orderbook      - Order book
 */

import { Router } from 'express';
import type { ExplorerService } from '../services/explorer.service.js';
import { HistoryQuerySchema, MarketsQuerySchema, parseQuery } from './query.js';

export function createMarketsRouter(explorer: ExplorerService): Router {
  const router = Router();

  router.get('/', (_req, res) => {
    res.json({ sports: explorer.listSports() });
  });

  router.get('/:sport/markets', async (req, res, next) => {
    try {
      const query = parseQuery(MarketsQuerySchema, req.query);
      res.json(await explorer.listMarkets(req.params.sport, query));
    } catch (error) {
      next(error);
    }
  });

  router.get('/:sport/markets/:ticker', async (req, res, next) => {
    try {
      res.json(await explorer.getMarket(req.params.sport, req.params.ticker));
    } catch (error) {
      next(error);
    }
  });

  router.get('/:sport/markets/:ticker/history', async (req, res, next) => {
    try {
      const query = parseQuery(HistoryQuerySchema, req.query);
      const candlesticks = await explorer.getHistory(req.params.sport, req.params.ticker, query);
      res.json({ ticker: req.params.ticker.toUpperCase(), candlesticks });
    } catch (error) {
      next(error);
    }
  });

  router.get('/:sport/markets/:ticker/orderbook', async (req, res, next) => {
    try {
      res.json(await explorer.getOrderBook(req.params.sport, req.params.ticker));
    } catch (error) {
      next(error);
    }
  });

  return router;
}
