import type { EmailRecord } from '@mailshelf/shared';
import { linkifyText } from '../lib/linkify';
import { EMAIL_PAGE_STYLES } from '../styles';
import { AppLayout } from './AppLayout';
import { AttachmentList } from './AttachmentList';

interface Props {
  email: EmailRecord;
  archiveTitle: string;
}

export function EmailPage({ email, archiveTitle }: Props) {
  return (
    <AppLayout title={`${email.subject} · ${archiveTitle}`} styles={EMAIL_PAGE_STYLES}>
      <div className="container">
        {/* Email header */}
        <div className="header">
          <h1>{email.subject}</h1>
          <div className="meta">
            <div>
              <strong>From:</strong> {email.from}
            </div>
            <div>
              <strong>To:</strong> {email.to}
            </div>
            <div>
              <strong>Date:</strong> {email.date}
            </div>
          </div>
        </div>

        <div className="content">
          <a href="../index.html" className="back">
            ← Back to All Emails
          </a>

          {/* bodyHtml has already been through the content sanitizer */}
          {email.isHtml ? (
            <div className="body-html" dangerouslySetInnerHTML={{ __html: email.bodyHtml }} />
          ) : (
            <div className="body-text">{email.bodyText ? linkifyText(email.bodyText) : '(No content)'}</div>
          )}

          {email.attachments.length > 0 && <AttachmentList attachments={email.attachments} />}
        </div>
      </div>
    </AppLayout>
  );
}
