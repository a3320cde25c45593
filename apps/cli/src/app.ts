import express, { type Express } from 'express';
import { silentLogger, type Logger } from '@mailshelf/archive-core';
import { createErrorHandler } from './middleware/error-handler';
import { notFound } from './middleware/not-found';

/** Read-only preview server for a built archive directory. */
export function createApp(archiveDir: string, logger: Logger = silentLogger): Express {
  const app = express();
  app.disable('x-powered-by');
  app.use(express.static(archiveDir, { index: 'index.html', dotfiles: 'deny' }));
  app.use(notFound);
  app.use(createErrorHandler(logger));
  return app;
}
