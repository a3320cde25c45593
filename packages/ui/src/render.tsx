import { renderToStaticMarkup } from 'react-dom/server';
import type { ArchiveIndexEntry, EmailRecord } from '@mailshelf/shared';
import { ArchiveIndexPage } from './components/ArchiveIndexPage';
import { EmailPage } from './components/EmailPage';

export const DEFAULT_ARCHIVE_TITLE = 'Mail Archive';

const DOCTYPE = '<!DOCTYPE html>\n';

export interface RenderOptions {
  /** Shown as the index heading and in every page title */
  archiveTitle?: string;
}

/** Standalone page for one email, linked from the index as `emails/<id>.html`. */
export function renderEmailPage(email: EmailRecord, options: RenderOptions = {}): string {
  const archiveTitle = options.archiveTitle ?? DEFAULT_ARCHIVE_TITLE;
  return DOCTYPE + renderToStaticMarkup(<EmailPage email={email} archiveTitle={archiveTitle} />);
}

export function renderIndexPage(entries: ArchiveIndexEntry[], options: RenderOptions = {}): string {
  const title = options.archiveTitle ?? DEFAULT_ARCHIVE_TITLE;
  return DOCTYPE + renderToStaticMarkup(<ArchiveIndexPage entries={entries} title={title} />);
}
