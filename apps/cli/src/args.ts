import type { ArchiveConfigInput } from '@mailshelf/archive-core';

export type Flags = Record<string, string | boolean>;

export interface ParsedArgs {
  command?: string;
  flags: Flags;
  rest: string[];
}

/** Flags that never take a value. */
const BOOLEAN_FLAGS = new Set(['help', 'no-attachments']);

export const USAGE = [
  'Usage:',
  '  mailshelf build <mbox> <outDir> [--config <file>] [--title <text>] [--preview-length <n>]',
  '                  [--log-level debug|info|warn|error] [--no-attachments]',
  '  mailshelf serve <outDir> [--port <n>]',
];

export function parseArgs(argv: string[]): ParsedArgs {
  const args = [...argv];
  const command = args.shift();
  const flags: Flags = {};
  const rest: string[] = [];

  while (args.length > 0) {
    const token = args.shift();
    if (token === undefined) break;
    if (token === '-h') {
      flags['help'] = true;
      continue;
    }
    if (token.startsWith('--')) {
      const key = token.slice(2);
      if (BOOLEAN_FLAGS.has(key)) {
        flags[key] = true;
        continue;
      }
      flags[key] = args.shift() ?? '';
      continue;
    }
    rest.push(token);
  }

  return { command, flags, rest };
}

export function stringFlag(flags: Flags, key: string): string | undefined {
  const value = flags[key];
  return typeof value === 'string' && value !== '' ? value : undefined;
}

/** Numeric flag; a malformed value comes back as NaN so config validation reports it. */
export function numberFlag(flags: Flags, key: string): number | undefined {
  const value = stringFlag(flags, key);
  return value === undefined ? undefined : Number(value);
}

/** Config overrides from build flags; unset flags leave file and defaults alone. */
export function configOverrides(flags: Flags): ArchiveConfigInput {
  const overrides: ArchiveConfigInput = {};
  const title = stringFlag(flags, 'title');
  const previewLength = numberFlag(flags, 'preview-length');
  const logLevel = stringFlag(flags, 'log-level');

  if (title !== undefined) overrides.archiveTitle = title;
  if (previewLength !== undefined) overrides.previewLength = previewLength;
  if (logLevel === 'debug' || logLevel === 'info' || logLevel === 'warn' || logLevel === 'error') {
    overrides.logLevel = logLevel;
  }
  if (flags['no-attachments'] === true) overrides.saveAttachments = false;
  return overrides;
}
