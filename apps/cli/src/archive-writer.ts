import * as fs from 'fs';
import * as path from 'path';
import type { ArchiveIndexEntry, ArchiveManifest, EmailRecord } from '@mailshelf/shared';
import { ArchiveError, type ArchiveConfig } from '@mailshelf/archive-core';
import { renderEmailPage, renderIndexPage } from '@mailshelf/ui';

/**
 * Output side of a build: the directory tree, one page per email, the
 * index page and the manifest.
 */
export class ArchiveWriter {
  readonly emailsDir: string;
  readonly attachmentsDir: string;

  constructor(
    readonly outDir: string,
    private readonly config: ArchiveConfig
  ) {
    this.emailsDir = path.join(outDir, config.emailsDirName);
    this.attachmentsDir = path.join(outDir, config.attachmentsDirName);
  }

  prepare(): void {
    for (const dir of [this.outDir, this.emailsDir, this.attachmentsDir]) {
      try {
        fs.mkdirSync(dir, { recursive: true });
      } catch (err) {
        throw new ArchiveError(`Cannot create output directory ${dir}`, { cause: err });
      }
    }
  }

  writeEmail(record: EmailRecord): string {
    const filePath = path.join(this.emailsDir, `${record.id}.html`);
    this.write(filePath, renderEmailPage(record, { archiveTitle: this.config.archiveTitle }));
    return filePath;
  }

  writeIndex(entries: ArchiveIndexEntry[]): string {
    const filePath = path.join(this.outDir, 'index.html');
    this.write(filePath, renderIndexPage(entries, { archiveTitle: this.config.archiveTitle }));
    return filePath;
  }

  writeManifest(manifest: ArchiveManifest): string {
    const filePath = path.join(this.outDir, 'manifest.json');
    this.write(filePath, JSON.stringify(manifest, null, 2) + '\n');
    return filePath;
  }

  private write(filePath: string, content: string): void {
    try {
      fs.writeFileSync(filePath, content, 'utf-8');
    } catch (err) {
      throw new ArchiveError(`Cannot write ${filePath}`, { cause: err });
    }
  }
}
