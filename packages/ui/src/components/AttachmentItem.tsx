import type { AttachmentRecord } from '@mailshelf/shared';
import { formatFileSize } from '@mailshelf/shared';

interface Props {
  attachment: AttachmentRecord;
}

function encodePath(archivePath: string): string {
  return archivePath.split('/').map(encodeURIComponent).join('/');
}

export function AttachmentItem({ attachment }: Props) {
  return (
    <li>
      <a href={`../${encodePath(attachment.path)}`} download>
        {`${attachment.filename} (${formatFileSize(attachment.size)})`}
      </a>
    </li>
  );
}
