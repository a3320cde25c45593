import type { ErrorRequestHandler } from 'express';
import { errorMessage, type Logger } from '@mailshelf/archive-core';

function statusOf(err: unknown): number {
  if (typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number') {
    if (err.status >= 400 && err.status < 600) return err.status;
  }
  return 500;
}

export function createErrorHandler(logger: Logger): ErrorRequestHandler {
  return (err: unknown, req, res, next) => {
    if (res.headersSent) {
      next(err);
      return;
    }
    const status = statusOf(err);
    logger.error(`${req.method} ${req.path} failed`, { status, error: errorMessage(err) });
    // Server-side failures stay in the log
    res.status(status).json({ error: status >= 500 ? 'Internal server error' : errorMessage(err) });
  };
}
