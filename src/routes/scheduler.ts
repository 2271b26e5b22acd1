import { Router } from 'express';
import pino from 'pino';
import { z } from 'zod';
import { validate, validateParams } from '../middleware/validation.js';
import type { SchedulerService } from '../services/scheduler/scheduler-service.js';
import { sendError, sendResult } from './respond.js';

const log = pino({ name: 'scheduler-routes' });

const queueParamsSchema = z.object({ id: z.coerce.number().int().positive() });
const scheduleBodySchema = z.object({ reschedule: z.boolean().default(false) });

type QueueParams = z.infer<typeof queueParamsSchema>;
type ScheduleBody = z.infer<typeof scheduleBodySchema>;

/**
 * Scheduler control surface.
 *
 *   GET    /status                 scheduler status and due jobs
 *   POST   /queues/:id/schedule    add (or with `reschedule`, rebuild) a queue's job
 *   DELETE /queues/:id/schedule    remove a queue's job
 *   POST   /queues/:id/pause       stop future runs, keep next_run_at
 *   POST   /queues/:id/resume
 *   POST   /queues/:id/activate    re-enable after automatic deactivation
 *   POST   /queues/:id/run         execute now and return the result
 */
export function createSchedulerRouter(scheduler: SchedulerService): Router {
  const router = Router();
  const params = validateParams(queueParamsSchema);

  router.get('/status', (_req, res) => {
    res.json(scheduler.getSchedulerStatus());
  });

  router.post('/queues/:id/schedule', params, validate(scheduleBodySchema), async (req, res) => {
    const { id }: QueueParams = res.locals.params;
    const { reschedule }: ScheduleBody = req.body;
    try {
      sendResult(res, await scheduler.scheduleQueue(id, reschedule));
    } catch (error) {
      sendError(log, res, error, 'Failed to schedule queue');
    }
  });

  router.delete('/queues/:id/schedule', params, async (_req, res) => {
    const { id }: QueueParams = res.locals.params;
    try {
      sendResult(res, await scheduler.unscheduleQueue(id));
    } catch (error) {
      sendError(log, res, error, 'Failed to unschedule queue');
    }
  });

  router.post('/queues/:id/pause', params, async (_req, res) => {
    const { id }: QueueParams = res.locals.params;
    try {
      sendResult(res, await scheduler.pauseQueue(id));
    } catch (error) {
      sendError(log, res, error, 'Failed to pause queue');
    }
  });

  router.post('/queues/:id/resume', params, async (_req, res) => {
    const { id }: QueueParams = res.locals.params;
    try {
      sendResult(res, await scheduler.resumeQueue(id));
    } catch (error) {
      sendError(log, res, error, 'Failed to resume queue');
    }
  });

  router.post('/queues/:id/activate', params, async (_req, res) => {
    const { id }: QueueParams = res.locals.params;
    try {
      sendResult(res, await scheduler.reactivateQueue(id));
    } catch (error) {
      sendError(log, res, error, 'Failed to reactivate queue');
    }
  });

  router.post('/queues/:id/run', params, async (_req, res) => {
    const { id }: QueueParams = res.locals.params;
    try {
      sendResult(res, await scheduler.executeQueueNow(id));
    } catch (error) {
      sendError(log, res, error, 'Failed to execute queue');
    }
  });

  return router;
}
