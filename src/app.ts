import express, { type NextFunction, type Request, type Response } from 'express';
import helmet from 'helmet';
import pino from 'pino';
import { createHealthRouter } from './routes/health.js';
import { createHistoryRouter } from './routes/history.js';
import { createSchedulerRouter } from './routes/scheduler.js';
import { createStatusRouter, type StatusDeps } from './routes/status.js';
import type { HistoryRecorder } from './services/history/recorder.js';

const logger = pino({ name: 'http' });

export interface AppDeps extends StatusDeps {
  history: HistoryRecorder;
  checkDatabase: () => Promise<unknown>;
}

export function createApp(deps: AppDeps): express.Express {
  const app = express();

  // Security headers
  app.use(helmet());
  app.use(express.json());

  // Request logging middleware
  app.use((req, _res, next) => {
    logger.info({ method: req.method, url: req.url }, 'request');
    next();
  });

  app.use(createHealthRouter(deps.checkDatabase));
  app.use('/api/scheduler', createSchedulerRouter(deps.scheduler));
  app.use('/api/history', createHistoryRouter(deps.history));
  app.use('/api/status', createStatusRouter(deps));

  app.use((_req, res) => {
    res.status(404).json({ error: 'Not found' });
  });

  // Malformed JSON bodies and anything a route let escape
  app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
    if (error instanceof SyntaxError) {
      res.status(400).json({ error: 'Malformed JSON body' });
      return;
    }
    logger.error({ err: error, method: req.method, url: req.url }, 'Unhandled route error');
    res.status(500).json({ error: 'Internal server error' });
  });

  return app;
}
