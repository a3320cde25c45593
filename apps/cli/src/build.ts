import * as path from 'path';
import { setImmediate as yieldToEventLoop } from 'timers/promises';
import { v4 as uuidv4 } from 'uuid';
import type { ArchiveIndexEntry, ArchiveManifest } from '@mailshelf/shared';
import { toIndexEntry } from '@mailshelf/shared';
import {
  ContentSanitizer,
  MessageIngestor,
  openMbox,
  type ArchiveConfig,
  type Logger,
} from '@mailshelf/archive-core';
import { ArchiveWriter } from './archive-writer';

export interface BuildOptions {
  mboxPath: string;
  outDir: string;
  config: ArchiveConfig;
  logger: Logger;
  signal?: AbortSignal;
}

export interface BuildResult {
  manifest: ArchiveManifest;
  indexPath: string;
}

/**
 * Convert one mbox file into a browsable archive under `outDir`. Pages are
 * written as messages stream in; the index and manifest come last, also
 * after a cancellation.
 */
export async function buildArchive(options: BuildOptions): Promise<BuildResult> {
  const { config, logger, signal } = options;
  const runId = uuidv4();

  logger.info(`Opening MBOX file: ${options.mboxPath}`, { runId });
  const container = openMbox(options.mboxPath);

  const writer = new ArchiveWriter(options.outDir, config);
  writer.prepare();

  const sanitizer = new ContentSanitizer(config.sanitizer, logger);
  const ingestor = new MessageIngestor({
    config,
    sanitizer,
    attachmentsDir: writer.attachmentsDir,
    logger,
    signal,
  });

  const entries: ArchiveIndexEntry[] = [];
  for (const record of ingestor.ingest(container)) {
    writer.writeEmail(record);
    entries.push(toIndexEntry(record));
    // Let signal handlers run between messages
    await yieldToEventLoop();
  }

  logger.info('Creating main index page...');
  const indexPath = writer.writeIndex(entries);

  const manifest: ArchiveManifest = {
    runId,
    generatedAt: new Date().toISOString(),
    source: path.resolve(options.mboxPath),
    archiveTitle: config.archiveTitle,
    totals: ingestor.summary,
    sanitization: sanitizer.getStats(),
  };
  writer.writeManifest(manifest);

  return { manifest, indexPath };
}
