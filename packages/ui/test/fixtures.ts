import type { EmailRecord } from '@mailshelf/shared';

export function makeRecord(overrides: Partial<EmailRecord> = {}): EmailRecord {
  return {
    id: 1,
    subject: 'Quarterly update',
    from: 'Alice Example <alice@example.com>',
    fromName: 'Alice Example',
    to: 'bob@example.com',
    date: 'Mon, 1 Jan 2024 10:00:00 +0000',
    bodyText: 'Hello Bob',
    bodyHtml: '',
    isHtml: false,
    preview: 'Hello Bob',
    attachments: [],
    ...overrides,
  };
}
