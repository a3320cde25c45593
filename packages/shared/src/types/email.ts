/** One attachment written to disk while ingesting a message. */
export interface AttachmentRecord {
  filename: string;
  /** Relative to the archive root, e.g. `attachments/12/report.pdf` */
  path: string;
  size: number;
}

/** Normalized output for one message of the container. */
export interface EmailRecord {
  /** 1-based position in the container, stable for the run */
  id: number;
  subject: string;
  from: string;
  fromName: string;
  to: string;
  /** Raw Date header, not reformatted */
  date: string;
  bodyText: string;
  bodyHtml: string;
  isHtml: boolean;
  preview: string;
  attachments: AttachmentRecord[];
}

/** Compact entry embedded in the index page's search data. */
export type ArchiveIndexEntry = Pick<
  EmailRecord,
  'id' | 'subject' | 'from' | 'fromName' | 'to' | 'date' | 'preview' | 'attachments'
>;

/** Counters kept by a ContentSanitizer instance, one per rule. */
export interface SanitizationStats {
  scriptsRemoved: number;
  eventHandlersRemoved: number;
  javascriptLinksNeutralized: number;
  externalImagesReplaced: number;
  base64ImagesStripped: number;
  styleBlocksRemoved: number;
  styleAttributesTruncated: number;
  linkElementsRemoved: number;
  trackingPixelsRemoved: number;
}

export function emptySanitizationStats(): SanitizationStats {
  return {
    scriptsRemoved: 0,
    eventHandlersRemoved: 0,
    javascriptLinksNeutralized: 0,
    externalImagesReplaced: 0,
    base64ImagesStripped: 0,
    styleBlocksRemoved: 0,
    styleAttributesTruncated: 0,
    linkElementsRemoved: 0,
    trackingPixelsRemoved: 0,
  };
}

export function toIndexEntry(record: EmailRecord): ArchiveIndexEntry {
  return {
    id: record.id,
    subject: record.subject,
    from: record.from,
    fromName: record.fromName,
    to: record.to,
    date: record.date,
    preview: record.preview.replace(/\r/g, '').replace(/\n/g, ' '),
    attachments: record.attachments,
  };
}
