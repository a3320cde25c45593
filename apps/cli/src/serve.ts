import * as fs from 'fs';
import type { Server } from 'http';
import * as path from 'path';
import { ArchiveError, type Logger } from '@mailshelf/archive-core';
import { createApp } from './app';

export const DEFAULT_PORT = 8080;

/** Start serving `archiveDir`; resolves once the server is listening. */
export function startServer(archiveDir: string, port: number, logger: Logger): Promise<Server> {
  if (!fs.existsSync(path.join(archiveDir, 'index.html'))) {
    return Promise.reject(new ArchiveError(`No archive found in ${archiveDir} (index.html is missing)`));
  }

  const app = createApp(archiveDir, logger);
  return new Promise((resolve, reject) => {
    const server = app.listen(port, () => {
      server.off('error', reject);
      resolve(server);
    });
    server.once('error', reject);
  });
}
