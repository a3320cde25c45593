import type { ArchiveIndexEntry } from '@mailshelf/shared';
import { truncate } from '@mailshelf/shared';

interface Props {
  email: ArchiveIndexEntry;
}

export function EmailListItem({ email }: Props) {
  return (
    <li className="email-item" data-id={email.id}>
      <a href={`emails/${email.id}.html`}>
        <div className="email-subject">
          {email.subject}
          {email.attachments.length > 0 && (
            <span className="attachment-badge">{`📎 ${email.attachments.length}`}</span>
          )}
        </div>
        <div className="email-meta">
          <strong>{email.fromName}</strong>
          {` · ${email.date}`}
        </div>
        <div className="email-preview">{truncate(email.preview, 160)}</div>
      </a>
    </li>
  );
}
