import { Router } from 'express';
import pino from 'pino';
import { z } from 'zod';
import { validate, validateParams, validateQuery } from '../middleware/validation.js';
import type { HistoryRecorder } from '../services/history/recorder.js';
import { sendError } from './respond.js';

const log = pino({ name: 'history-routes' });

const statsQuerySchema = z.object({
  days: z.coerce.number().int().min(1).max(365).default(7),
  queueId: z.coerce.number().int().positive().optional(),
  instanceId: z.coerce.number().int().positive().optional(),
});

const performanceQuerySchema = z.object({
  days: z.coerce.number().int().min(1).max(365).default(30),
});

const failuresQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(100).default(10),
});

const cleanupBodySchema = z.object({
  retentionDays: z.number().int().min(1).max(3650),
});

const queueParamsSchema = z.object({ id: z.coerce.number().int().positive() });

type StatsQuery = z.infer<typeof statsQuerySchema>;
type PerformanceQuery = z.infer<typeof performanceQuerySchema>;
type FailuresQuery = z.infer<typeof failuresQuerySchema>;
type CleanupBody = z.infer<typeof cleanupBodySchema>;
type QueueParams = z.infer<typeof queueParamsSchema>;

export function createHistoryRouter(history: HistoryRecorder): Router {
  const router = Router();

  /**
   * GET /api/history/stats: success rate, totals, runs by strategy and a per-day series.
   */
  router.get('/stats', validateQuery(statsQuerySchema), async (_req, res) => {
    const query: StatsQuery = res.locals.query;
    try {
      res.json(await history.getStatistics(query));
    } catch (error) {
      sendError(log, res, error, 'Failed to compute history statistics');
    }
  });

  router.get(
    '/queues/:id/performance',
    validateParams(queueParamsSchema),
    validateQuery(performanceQuerySchema),
    async (_req, res) => {
      const { id }: QueueParams = res.locals.params;
      const { days }: PerformanceQuery = res.locals.query;
      try {
        res.json(await history.getQueuePerformance(id, days));
      } catch (error) {
        sendError(log, res, error, 'Failed to compute queue performance');
      }
    },
  );

  router.get('/failures', validateQuery(failuresQuerySchema), async (_req, res) => {
    const { limit }: FailuresQuery = res.locals.query;
    try {
      res.json({ data: await history.getRecentFailures(limit) });
    } catch (error) {
      sendError(log, res, error, 'Failed to load recent failures');
    }
  });

  router.post('/cleanup', validate(cleanupBodySchema), async (req, res) => {
    const { retentionDays }: CleanupBody = req.body;
    try {
      res.json({ deleted: await history.cleanup(retentionDays) });
    } catch (error) {
      sendError(log, res, error, 'Failed to clean up history');
    }
  });

  return router;
}
