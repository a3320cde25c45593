import type { ArchiveManifest, SanitizationStats } from '@mailshelf/shared';

const SANITIZATION_ROWS: ReadonlyArray<[keyof SanitizationStats, string]> = [
  ['scriptsRemoved', 'Scripts removed'],
  ['eventHandlersRemoved', 'Event handlers removed'],
  ['javascriptLinksNeutralized', 'JavaScript links neutralized'],
  ['externalImagesReplaced', 'External images replaced'],
  ['base64ImagesStripped', 'Inline images stripped'],
  ['styleBlocksRemoved', 'Style blocks removed'],
  ['styleAttributesTruncated', 'Style attributes truncated'],
  ['linkElementsRemoved', 'Link elements removed'],
  ['trackingPixelsRemoved', 'Tracking pixels removed'],
];

const LABEL_WIDTH = 30;

function row(label: string, value: number): string {
  return `  ${`${label}:`.padEnd(LABEL_WIDTH)}${value}`;
}

/** End-of-run summary, one line per entry. */
export function formatReport(manifest: ArchiveManifest, indexPath: string): string[] {
  const { totals, sanitization } = manifest;
  const lines = [
    totals.cancelled ? 'Archive incomplete (cancelled)' : 'Archive complete',
    row('Total emails found', totals.total),
    row('Successfully processed', totals.processed),
    row('Skipped (errors)', totals.skipped),
    row('Attachments saved', totals.attachments),
    'Sanitization:',
  ];

  for (const [key, label] of SANITIZATION_ROWS) {
    lines.push(row(label, sanitization[key]));
  }

  lines.push(`Open ${indexPath} in a browser to view the archive.`);
  return lines;
}
