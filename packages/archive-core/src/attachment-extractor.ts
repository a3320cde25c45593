import * as fs from 'fs';
import * as path from 'path';
import type { AttachmentRecord } from '@mailshelf/shared';
import { formatFileSize } from '@mailshelf/shared';
import { errorMessage } from './errors';
import { numberedFilename, sanitizeFilename } from './filename';
import { decodeHeader } from './header-decoder';
import { silentLogger, type Logger } from './logger';
import { isMultipart, walkParts, type MessagePart } from './mime-tree';

export interface AttachmentExtractorOptions {
  /** Directory that receives one sub-directory per message */
  targetDir: string;
  /** Name used for the archive-relative path, e.g. `attachments` */
  attachmentsDirName: string;
  defaultCharset?: string;
  logger?: Logger;
}

function uniqueName(name: string, used: Set<string>): string {
  let candidate = name;
  for (let n = 2; used.has(candidate.toLowerCase()); n++) {
    candidate = numberedFilename(name, n);
  }
  used.add(candidate.toLowerCase());
  return candidate;
}

/**
 * Write every attachment of a multipart message to
 * `<targetDir>/<messageId>/<filename>`. A failed write is logged and
 * skipped; the remaining parts are still extracted.
 */
export function extractAttachments(
  message: MessagePart,
  messageId: number,
  options: AttachmentExtractorOptions
): AttachmentRecord[] {
  const logger = options.logger ?? silentLogger;
  const attachments: AttachmentRecord[] = [];
  if (!isMultipart(message)) return attachments;

  const messageDir = path.join(options.targetDir, String(messageId));
  const used = new Set<string>();

  for (const part of walkParts(message)) {
    if (part.disposition !== 'attachment' || !part.filename) continue;
    if (part.content.length === 0) continue;

    const filename = uniqueName(
      sanitizeFilename(decodeHeader(part.filename, options.defaultCharset)),
      used
    );

    try {
      fs.mkdirSync(messageDir, { recursive: true });
      fs.writeFileSync(path.join(messageDir, filename), part.content);
    } catch (err) {
      logger.warn(`Could not save attachment ${filename}`, { email: messageId, error: errorMessage(err) });
      continue;
    }

    attachments.push({
      filename,
      path: `${options.attachmentsDirName}/${messageId}/${filename}`,
      size: part.content.length,
    });
    logger.debug(`Saved attachment: ${filename} (${formatFileSize(part.content.length)})`);
  }

  return attachments;
}
