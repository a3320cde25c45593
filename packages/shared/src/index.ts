export type {
  AttachmentRecord,
  EmailRecord,
  ArchiveIndexEntry,
  SanitizationStats,
} from './types/email';
export type { ArchiveManifest, ArchiveTotals } from './types/manifest';
export { emptySanitizationStats, toIndexEntry } from './types/email';
export { formatFileSize, truncate } from './utils/format';
