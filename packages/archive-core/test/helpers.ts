import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { vi } from 'vitest';
import type { Logger } from '../src/logger';

/** Raw message bytes from header/body lines joined with LF. */
export function rawMessage(lines: string[]): Buffer {
  return Buffer.from(lines.join('\n'), 'utf-8');
}

export function makeTempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), 'mailshelf-test-'));
}

/** Write an mbox file holding the given messages, each behind an envelope line. */
export function writeMbox(dir: string, messages: string[][], name = 'test.mbox'): string {
  const filePath = path.join(dir, name);
  const content = messages
    .map((lines) => `From sender@example.com Mon Jan  1 00:00:00 2024\n${lines.join('\n')}\n`)
    .join('\n');
  fs.writeFileSync(filePath, content);
  return filePath;
}

export function recordingLogger() {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  } satisfies Logger;
}
