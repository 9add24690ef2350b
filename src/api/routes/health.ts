/**
 * GET /api/health, liveness for the API process
 */

import { Router } from 'express';

export function createHealthRouter(startedAt: Date = new Date()): Router {
  const router = Router();

  router.get('/', (_req, res) => {
    res.json({
      status: 'ok',
      service: 'market-lens-api',
      timestamp: new Date().toISOString(),
      uptimeSeconds: Math.floor((Date.now() - startedAt.getTime()) / 1000),
    });
  });

  return router;
}
