export const UNNAMED_FILE = 'unnamed_file';
/** Limit in characters and in UTF-8 bytes; filesystems count the latter */
export const MAX_FILENAME_LENGTH = 255;

function splitExtension(name: string): { base: string; ext: string | null } {
  const dot = name.lastIndexOf('.');
  if (dot === -1) return { base: name, ext: null };
  return { base: name.slice(0, dot), ext: name.slice(dot + 1) };
}

function withinLimit(name: string): boolean {
  return Array.from(name).length <= MAX_FILENAME_LENGTH && Buffer.byteLength(name) <= MAX_FILENAME_LENGTH;
}

/** Longest prefix of `text` with at most `maxChars` characters and `maxBytes` UTF-8 bytes. */
function takePrefix(text: string, maxChars: number, maxBytes: number): string {
  let out = '';
  let bytes = 0;
  for (const ch of Array.from(text).slice(0, maxChars)) {
    bytes += Buffer.byteLength(ch);
    if (bytes > maxBytes) break;
    out += ch;
  }
  return out;
}

/** `base` cut so that `base + tail` fits; `null` when `tail` alone leaves no room. */
function fitWithTail(base: string, tail: string): string | null {
  const charRoom = MAX_FILENAME_LENGTH - Array.from(tail).length;
  const byteRoom = MAX_FILENAME_LENGTH - Buffer.byteLength(tail);
  if (charRoom < 1 || byteRoom < 1) return null;
  return takePrefix(base, charRoom, byteRoom) + tail;
}

/** Cut to the length limit, keeping the text after the last dot when it fits. */
function truncatePreservingExtension(name: string): string {
  if (withinLimit(name)) return name;

  const { base, ext } = splitExtension(name);
  if (ext !== null) {
    const fitted = fitWithTail(base, '.' + ext);
    if (fitted !== null) return fitted;
  }
  return takePrefix(name, MAX_FILENAME_LENGTH, MAX_FILENAME_LENGTH);
}

/**
 * Turn an attachment name into a single safe path segment: no parent
 * references, no separators, only letters, digits, `_`, whitespace, `.`
 * and `-`, at most 255 characters and 255 bytes. Never returns an empty name.
 */
export function sanitizeFilename(filename: string | null | undefined): string {
  if (!filename) return UNNAMED_FILE;

  let name = filename.replace(/\.\./g, '').replace(/[/\\]/g, '_');
  name = name.replace(/[^\p{L}\p{N}_\s.-]/gu, '_');
  name = truncatePreservingExtension(name);

  // "." alone (or only dots and blanks) would name the directory itself
  if (/^[.\s]*$/.test(name)) return UNNAMED_FILE;
  return name;
}

/**
 * `name` with `_<n>` before its extension, still within the length limit.
 * Used when two attachments of one message share a name.
 */
export function numberedFilename(name: string, n: number): string {
  const { base, ext } = splitExtension(name);
  const fitted = fitWithTail(base, `_${n}${ext !== null ? `.${ext}` : ''}`);
  return fitted ?? truncatePreservingExtension(`${name}_${n}`);
}
