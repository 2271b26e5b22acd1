import type { Response } from 'express';
import type { Logger } from 'pino';
import { AppError, type Result } from '../utils/errors.js';

export function sendResult<T>(res: Response, result: Result<T, AppError>): void {
  if (result.success) {
    res.json({ data: result.data });
    return;
  }
  res.status(result.error.statusCode).json({ error: result.error.message, code: result.error.code });
}

export function sendError(log: Logger, res: Response, error: unknown, message: string): void {
  if (error instanceof AppError && error.statusCode < 500) {
    res.status(error.statusCode).json({ error: error.message, code: error.code });
    return;
  }
  log.error({ err: error }, message);
  res.status(500).json({ error: message });
}
