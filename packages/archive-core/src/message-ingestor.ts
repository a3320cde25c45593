import { addressParser } from 'postal-mime';
import type { ArchiveTotals, EmailRecord } from '@mailshelf/shared';
import { extractAttachments } from './attachment-extractor';
import { resolveBody } from './body-resolver';
import type { ArchiveConfig } from './config';
import type { ContentSanitizer } from './content-sanitizer';
import { errorMessage } from './errors';
import { decodeHeader } from './header-decoder';
import { silentLogger, type Logger } from './logger';
import type { MboxContainer } from './mbox-reader';
import { getHeader, parseMessage, type MessagePart } from './mime-tree';

export const NO_SUBJECT = '(No Subject)';
export const UNKNOWN_ADDRESS = 'Unknown';
export const UNKNOWN_DATE = 'Unknown Date';

export interface MessageIngestorOptions {
  config: ArchiveConfig;
  sanitizer: ContentSanitizer;
  /** Where attachments are written; omit to skip extraction */
  attachmentsDir?: string;
  logger?: Logger;
  /** Checked between messages, never mid-message */
  signal?: AbortSignal;
}

export type IngestSummary = ArchiveTotals;

/**
 * First `length` characters of the body on one line, with `...` appended
 * when the body was longer.
 */
export function buildPreview(bodyText: string, length: number): string {
  const chars = Array.from(bodyText);
  const head = chars.slice(0, length).join('').replace(/[\r\n]/g, ' ');
  return chars.length > length ? `${head}...` : head;
}

/** Display name for a From value: the name part if present, otherwise the address. */
export function extractSenderName(from: string): string {
  const trimmed = from.trim();
  if (!trimmed) return UNKNOWN_ADDRESS;
  const [first] = addressParser(trimmed);
  if (!first) return trimmed;
  if (first.name) return first.name;
  return ('address' in first && typeof first.address === 'string' && first.address) || trimmed;
}

function headerOrDefault(message: MessagePart, name: string, fallback: string, charset: string): string {
  const decoded = decodeHeader(getHeader(message, name), charset).trim();
  return decoded || fallback;
}

/**
 * Drives one pass over an mbox container, turning each message into an
 * EmailRecord. A message that fails is logged with its position and left
 * out; container-level failures propagate and end the run.
 */
export class MessageIngestor {
  private readonly logger: Logger;
  private state: IngestSummary = { total: 0, processed: 0, skipped: 0, attachments: 0, cancelled: false };

  constructor(private readonly options: MessageIngestorOptions) {
    this.logger = options.logger ?? silentLogger;
  }

  get summary(): IngestSummary {
    return { ...this.state };
  }

  *ingest(container: MboxContainer): Generator<EmailRecord> {
    const { config, signal } = this.options;
    this.state = { total: container.count, processed: 0, skipped: 0, attachments: 0, cancelled: false };
    this.logger.info(`Found ${container.count} emails in MBOX file`);

    let idx = 0;
    for (const raw of container.messages()) {
      if (signal?.aborted) {
        this.state.cancelled = true;
        this.logger.warn('Operation cancelled by user', { processed: this.state.processed });
        return;
      }
      idx++;

      let record: EmailRecord;
      try {
        record = this.buildRecord(parseMessage(raw), idx);
      } catch (err) {
        this.state.skipped++;
        this.logger.warn(`Error processing email ${idx}`, { error: errorMessage(err) });
        continue;
      }

      this.state.processed++;
      this.state.attachments += record.attachments.length;
      if (idx % config.progressInterval === 0 || idx === container.count) {
        const progress = ((idx / container.count) * 100).toFixed(1);
        this.logger.info(`Processing: ${idx}/${container.count} (${progress}%) - ${record.subject.slice(0, 50)}`);
      }
      yield record;
    }
  }

  /** Normalize one parsed message. Throws on failure; `ingest` isolates it. */
  buildRecord(message: MessagePart, id: number): EmailRecord {
    const { config, sanitizer, attachmentsDir } = this.options;
    const charset = config.encoding.primary;

    const subject = headerOrDefault(message, 'subject', NO_SUBJECT, charset);
    const rawFrom = decodeHeader(getHeader(message, 'from'), charset).trim();
    const from = rawFrom || UNKNOWN_ADDRESS;
    const to = headerOrDefault(message, 'to', UNKNOWN_ADDRESS, charset);
    const date = getHeader(message, 'date')?.trim() || UNKNOWN_DATE;

    const body = resolveBody(message, { encoding: config.encoding, logger: this.logger });
    const bodyHtml = body.isHtml ? sanitizer.sanitize(body.htmlText) : '';

    const attachments =
      attachmentsDir && config.saveAttachments
        ? extractAttachments(message, id, {
            targetDir: attachmentsDir,
            attachmentsDirName: config.attachmentsDirName,
            defaultCharset: charset,
            logger: this.logger,
          })
        : [];

    return {
      id,
      subject,
      from,
      fromName: extractSenderName(rawFrom),
      to,
      date,
      bodyText: body.plainText,
      bodyHtml,
      isHtml: body.isHtml,
      preview: buildPreview(body.plainText, config.previewLength),
      attachments,
    };
  }
}
