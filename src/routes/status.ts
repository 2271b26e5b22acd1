import { Router, type Request, type Response } from 'express';
import pino from 'pino';
import { z } from 'zod';
import { validate } from '../middleware/validation.js';
import type { CooldownTracker } from '../services/cooldown/cooldown-tracker.js';
import type { JobRegistry } from '../services/jobs/registry.js';
import type { RateLimiterRegistry } from '../services/rate-limit/token-bucket.js';
import type { SchedulerService } from '../services/scheduler/scheduler-service.js';
import { sendError } from './respond.js';

const log = pino({ name: 'status' });

const jobActionSchema = z.object({ action: z.enum(['pause', 'resume', 'run']) });

type JobAction = z.infer<typeof jobActionSchema>;

export interface StatusDeps {
  scheduler: SchedulerService;
  jobs: JobRegistry;
  limiters: RateLimiterRegistry;
  cooldown: CooldownTracker;
}

export function createStatusRouter(deps: StatusDeps): Router {
  const router = Router();

  /**
   * GET /api/status: scheduler, housekeeping jobs, per-instance rate limits
   * and cooldown map size.
   */
  router.get('/', async (_req: Request, res: Response) => {
    try {
      res.json({
        scheduler: deps.scheduler.getSchedulerStatus(),
        jobs: deps.jobs.getStatuses(),
        rateLimits: await deps.limiters.states(),
        cooldown: deps.cooldown.getStats(),
      });
    } catch (error) {
      sendError(log, res, error, 'Failed to load status');
    }
  });

  /**
   * POST /api/status/jobs/:name: pause, resume or run a housekeeping job now.
   *
   * Body: { action: 'pause' | 'resume' | 'run' }
   */
  router.post('/jobs/:name', validate(jobActionSchema), async (req, res) => {
    const { name } = req.params;
    const { action }: JobAction = req.body;

    if (!deps.jobs.has(name)) {
      res.status(404).json({ error: `Job '${name}' not found` });
      return;
    }

    if (action === 'pause') {
      deps.jobs.pause(name);
      log.info({ job: name }, 'Job paused via API');
      res.json({ status: 'paused' });
      return;
    }

    if (action === 'resume') {
      deps.jobs.resume(name);
      log.info({ job: name }, 'Job resumed via API');
      res.json({ status: 'running' });
      return;
    }

    try {
      const ran = await deps.jobs.runNow(name);
      if (!ran) {
        res.status(409).json({ error: `Job '${name}' is already running` });
        return;
      }
      res.json({ status: 'completed', job: deps.jobs.getStatuses()[name] });
    } catch (error) {
      sendError(log, res, error, 'Failed to run job');
    }
  });

  return router;
}
