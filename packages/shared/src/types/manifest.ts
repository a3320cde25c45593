import type { SanitizationStats } from './email';

export interface ArchiveTotals {
  /** Messages found in the container */
  total: number;
  processed: number;
  skipped: number;
  attachments: number;
  /** The run was interrupted; the index covers only processed messages */
  cancelled: boolean;
}

/** Written next to index.html as manifest.json. */
export interface ArchiveManifest {
  runId: string;
  /** ISO 8601 */
  generatedAt: string;
  source: string;
  archiveTitle: string;
  totals: ArchiveTotals;
  sanitization: SanitizationStats;
}
