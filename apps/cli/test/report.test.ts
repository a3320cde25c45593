import { describe, it, expect } from 'vitest';
import type { ArchiveManifest } from '@mailshelf/shared';
import { emptySanitizationStats } from '@mailshelf/shared';
import { formatReport } from '../src/report';

function makeManifest(cancelled: boolean): ArchiveManifest {
  return {
    runId: 'run-1',
    generatedAt: '2024-01-01T00:00:00.000Z',
    source: '/tmp/sample.mbox',
    archiveTitle: 'Mail Archive',
    totals: { total: 3, processed: 2, skipped: 1, attachments: 4, cancelled },
    sanitization: { ...emptySanitizationStats(), scriptsRemoved: 5 },
  };
}

describe('formatReport', () => {
  it('should list totals and every sanitization counter', () => {
    const lines = formatReport(makeManifest(false), 'out/index.html');

    expect(lines[0]).toBe('Archive complete');
    expect(lines[1]).toBe('  Total emails found:' + ' '.repeat(11) + '3');
    expect(lines[3]).toBe('  Skipped (errors):' + ' '.repeat(13) + '1');
    expect(lines).toContain('  Scripts removed:' + ' '.repeat(14) + '5');
    expect(lines).toHaveLength(16);
    expect(lines[15]).toBe('Open out/index.html in a browser to view the archive.');
  });

  it('should flag a cancelled run', () => {
    expect(formatReport(makeManifest(true), 'out/index.html')[0]).toBe('Archive incomplete (cancelled)');
  });
});
