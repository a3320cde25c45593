/**
 * Message Ingestion Tests
 */

import * as fs from 'fs';
import * as path from 'path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { EmailRecord } from '@mailshelf/shared';
import { DEFAULT_CONFIG, loadConfig } from '../src/config';
import { ContentSanitizer } from '../src/content-sanitizer';
import { openMbox } from '../src/mbox-reader';
import {
  MessageIngestor,
  NO_SUBJECT,
  UNKNOWN_ADDRESS,
  UNKNOWN_DATE,
  buildPreview,
  extractSenderName,
} from '../src/message-ingestor';
import { makeTempDir, recordingLogger, writeMbox } from './helpers';

class ExplodingSanitizer extends ContentSanitizer {
  sanitize(html: string): string {
    if (html.includes('EXPLODE')) throw new Error('boom');
    return super.sanitize(html);
  }
}

describe('buildPreview', () => {
  it('should keep short bodies whole', () => {
    expect(buildPreview('Short body', 200)).toBe('Short body');
  });

  it('should cut long bodies and append an ellipsis', () => {
    const preview = buildPreview('a'.repeat(250), 200);
    expect(preview).toBe('a'.repeat(200) + '...');
  });

  it('should put the preview on one line', () => {
    expect(buildPreview('line one\r\nline two', 200)).toBe('line one  line two');
  });
});

describe('extractSenderName', () => {
  it('should prefer the display name', () => {
    expect(extractSenderName('John Doe <john@example.com>')).toBe('John Doe');
    expect(extractSenderName('"Doe, Jane" <jane@example.com>')).toBe('Doe, Jane');
  });

  it('should fall back to the address', () => {
    expect(extractSenderName('john@example.com')).toBe('john@example.com');
  });

  it('should use the placeholder for an empty value', () => {
    expect(extractSenderName('')).toBe(UNKNOWN_ADDRESS);
  });
});

describe('MessageIngestor', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = makeTempDir();
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  function ingestAll(ingestor: MessageIngestor, messages: string[][]): EmailRecord[] {
    return [...ingestor.ingest(openMbox(writeMbox(tempDir, messages)))];
  }

  it('should sanitize HTML and keep the plain alternative', () => {
    const sanitizer = new ContentSanitizer(DEFAULT_CONFIG.sanitizer);
    const ingestor = new MessageIngestor({ config: DEFAULT_CONFIG, sanitizer });

    const [record] = ingestAll(ingestor, [
      [
        'From: John Doe <john@example.com>',
        'To: jane@example.com',
        'Subject: =?UTF-8?Q?Caf=C3=A9?=',
        'Date: Mon, 1 Jan 2024 10:00:00 +0000',
        'Content-Type: multipart/alternative; boundary="b"',
        '',
        '--b',
        'Content-Type: text/plain',
        '',
        'Hello',
        '--b',
        'Content-Type: text/html',
        '',
        '<p>Hi <script>bad()</script></p>',
        '--b--',
      ],
    ]);

    expect(record).toEqual({
      id: 1,
      subject: 'Café',
      from: 'John Doe <john@example.com>',
      fromName: 'John Doe',
      to: 'jane@example.com',
      date: 'Mon, 1 Jan 2024 10:00:00 +0000',
      bodyText: 'Hello',
      bodyHtml: '<p>Hi </p>',
      isHtml: true,
      preview: 'Hello',
      attachments: [],
    });
    expect(sanitizer.getStats().scriptsRemoved).toBe(1);
  });

  it('should fill in placeholders for missing headers', () => {
    const ingestor = new MessageIngestor({
      config: DEFAULT_CONFIG,
      sanitizer: new ContentSanitizer(DEFAULT_CONFIG.sanitizer),
    });

    const [record] = ingestAll(ingestor, [['Subject:   ', '', 'Body']]);

    expect(record.subject).toBe(NO_SUBJECT);
    expect(record.from).toBe(UNKNOWN_ADDRESS);
    expect(record.fromName).toBe(UNKNOWN_ADDRESS);
    expect(record.to).toBe(UNKNOWN_ADDRESS);
    expect(record.date).toBe(UNKNOWN_DATE);
    expect(record.isHtml).toBe(false);
    expect(record.bodyHtml).toBe('');
  });

  it('should truncate previews to the configured length', () => {
    const config = loadConfig({ previewLength: 10 });
    const ingestor = new MessageIngestor({ config, sanitizer: new ContentSanitizer(config.sanitizer) });

    const [record] = ingestAll(ingestor, [['Subject: Long', '', 'abcdefghijklmnop']]);

    expect(record.preview).toBe('abcdefghij...');
  });

  it('should skip a failing message and continue', () => {
    const logger = recordingLogger();
    const ingestor = new MessageIngestor({
      config: DEFAULT_CONFIG,
      sanitizer: new ExplodingSanitizer(DEFAULT_CONFIG.sanitizer),
      logger,
    });

    const records = ingestAll(ingestor, [
      ['Subject: First', '', 'one'],
      ['Subject: Second', 'Content-Type: text/html', '', '<div>EXPLODE</div>'],
      ['Subject: Third', '', 'three'],
    ]);

    expect(records.map((r) => [r.id, r.subject])).toEqual([
      [1, 'First'],
      [3, 'Third'],
    ]);
    expect(ingestor.summary).toEqual({ total: 3, processed: 2, skipped: 1, attachments: 0, cancelled: false });
    expect(logger.warn).toHaveBeenCalledWith('Error processing email 2', { error: 'boom' });
  });

  it('should stop between messages once the signal is aborted', () => {
    const controller = new AbortController();
    const ingestor = new MessageIngestor({
      config: DEFAULT_CONFIG,
      sanitizer: new ContentSanitizer(DEFAULT_CONFIG.sanitizer),
      signal: controller.signal,
    });
    const container = openMbox(
      writeMbox(tempDir, [
        ['Subject: One', '', '1'],
        ['Subject: Two', '', '2'],
      ])
    );

    const seen: string[] = [];
    for (const record of ingestor.ingest(container)) {
      seen.push(record.subject);
      controller.abort();
    }

    expect(seen).toEqual(['One']);
    expect(ingestor.summary.cancelled).toBe(true);
    expect(ingestor.summary.processed).toBe(1);
  });

  it('should log progress on the last message', () => {
    const logger = recordingLogger();
    const ingestor = new MessageIngestor({
      config: DEFAULT_CONFIG,
      sanitizer: new ContentSanitizer(DEFAULT_CONFIG.sanitizer),
      logger,
    });

    ingestAll(ingestor, [['Subject: Only', '', 'x']]);

    expect(logger.info).toHaveBeenCalledWith('Found 1 emails in MBOX file');
    expect(logger.info).toHaveBeenCalledWith('Processing: 1/1 (100.0%) - Only');
  });

  it('should extract attachments when a directory is given', () => {
    const attachmentsDir = path.join(tempDir, 'out', 'attachments');
    const ingestor = new MessageIngestor({
      config: DEFAULT_CONFIG,
      sanitizer: new ContentSanitizer(DEFAULT_CONFIG.sanitizer),
      attachmentsDir,
    });

    const [record] = ingestAll(ingestor, [
      [
        'Subject: With file',
        'Content-Type: multipart/mixed; boundary="b"',
        '',
        '--b',
        'Content-Type: text/plain',
        '',
        'See attached',
        '--b',
        'Content-Type: text/plain',
        'Content-Disposition: attachment; filename="notes.txt"',
        '',
        'remember',
        '--b--',
      ],
    ]);

    expect(record.bodyText).toBe('See attached');
    expect(record.attachments).toEqual([{ filename: 'notes.txt', path: 'attachments/1/notes.txt', size: 8 }]);
    expect(fs.readFileSync(path.join(attachmentsDir, '1', 'notes.txt'), 'utf-8')).toBe('remember');
    expect(ingestor.summary.attachments).toBe(1);
  });
});
