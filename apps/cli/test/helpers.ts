import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';

export function makeTempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), 'mailshelf-cli-'));
}

export function writeSampleMbox(dir: string): string {
  const filePath = path.join(dir, 'sample.mbox');
  const messages = [
    [
      'From: Alice Example <alice@example.com>',
      'To: bob@example.com',
      'Subject: Welcome',
      'Date: Mon, 1 Jan 2024 10:00:00 +0000',
      'Content-Type: text/html',
      '',
      '<p>Hello <script>track()</script><img src="https://cdn.example/x.png"></p>',
    ],
    [
      'From: carol@example.com',
      'Subject: Notes',
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
  ];
  const content = messages
    .map((lines) => `From sender@example.com Mon Jan  1 00:00:00 2024\n${lines.join('\n')}\n`)
    .join('\n');
  fs.writeFileSync(filePath, content);
  return filePath;
}
