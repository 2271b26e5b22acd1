import { Router } from 'express';

/**
 * Liveness plus a database round trip.
 */
export function createHealthRouter(checkDatabase: () => Promise<unknown>): Router {
  const router = Router();

  router.get('/healthz', async (_req, res) => {
    try {
      await checkDatabase();
      res.json({ status: 'ok', timestamp: new Date().toISOString() });
    } catch {
      res.status(503).json({ status: 'error' });
    }
  });

  return router;
}
