import type { AttachmentRecord } from '@mailshelf/shared';
import { AttachmentItem } from './AttachmentItem';

interface Props {
  attachments: AttachmentRecord[];
}

export function AttachmentList({ attachments }: Props) {
  return (
    <div className="attachments">
      <h3>{`Attachments (${attachments.length})`}</h3>
      <ul>
        {attachments.map((att) => (
          <AttachmentItem key={att.path} attachment={att} />
        ))}
      </ul>
    </div>
  );
}
