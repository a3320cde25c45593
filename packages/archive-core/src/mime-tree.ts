import { decodeBase64, decodeLenient, decodeQuotedPrintable, decodeWithFallback } from './encoding';

/** Lower-cased header name → values in message order. */
export type HeaderMap = Map<string, string[]>;

export type PartKind = 'leaf' | 'multipart' | 'message';

/** One node of a message's content tree. */
export interface MessagePart {
  kind: PartKind;
  headers: HeaderMap;
  /** Lower-cased, e.g. `text/plain`; `text/plain` when undeclared */
  mediaType: string;
  /** Declared charset, if any; may be wrong */
  charset?: string;
  /** Lower-cased disposition type (`inline`, `attachment`), '' when absent */
  disposition: string;
  /** Raw filename from Content-Disposition or Content-Type `name`; may hold encoded words */
  filename?: string;
  /** Payload after transfer decoding; empty for multipart containers */
  content: Buffer;
  children: MessagePart[];
}

interface ParsedHeaderValue {
  value: string;
  params: Record<string, string>;
}

const MAX_DEPTH = 32;
const HEADER_LINE = /^([!-9;-~]+):[ \t]*(.*)$/;

// ─── Header parsing ──────────────────────────────────────────────────

/** Header bytes are usually ASCII; raw UTF-8 is accepted, anything else is read as Latin-1. */
function decodeHeaderBytes(binary: string): string {
  const bytes = Buffer.from(binary, 'latin1');
  return decodeWithFallback(bytes, ['utf-8'])?.text ?? binary;
}

/**
 * Split a raw message (as a byte-per-char string) into header fields and
 * the byte offset where the body starts.
 */
function splitHeaders(binary: string): { headers: HeaderMap; bodyStart: number } {
  const headers: HeaderMap = new Map();
  let pos = 0;
  let current: { name: string; value: string } | null = null;

  const flush = () => {
    if (!current) return;
    const list = headers.get(current.name) ?? [];
    list.push(decodeHeaderBytes(current.value).trim());
    headers.set(current.name, list);
    current = null;
  };

  while (pos < binary.length) {
    const newline = binary.indexOf('\n', pos);
    const lineEnd = newline === -1 ? binary.length : newline;
    const next = newline === -1 ? binary.length : newline + 1;
    const line = binary.slice(pos, lineEnd).replace(/\r$/, '');

    if (line === '') {
      flush();
      return { headers, bodyStart: next };
    }

    if ((line[0] === ' ' || line[0] === '\t') && current) {
      current.value += line;
    } else {
      const match = HEADER_LINE.exec(line);
      if (!match) {
        // Not a header: the body starts here
        flush();
        return { headers, bodyStart: pos };
      }
      flush();
      current = { name: match[1].toLowerCase(), value: match[2] };
    }
    pos = next;
  }

  flush();
  return { headers, bodyStart: binary.length };
}

export function getHeader(part: Pick<MessagePart, 'headers'>, name: string): string | undefined {
  return part.headers.get(name.toLowerCase())?.[0];
}

/** Split on `;` outside double quotes. */
function splitParams(value: string): string[] {
  const pieces: string[] = [];
  let current = '';
  let inQuote = false;

  for (let i = 0; i < value.length; i++) {
    const ch = value[i];
    if (ch === '\\' && inQuote && i + 1 < value.length) {
      current += ch + value[i + 1];
      i++;
    } else if (ch === '"') {
      inQuote = !inQuote;
      current += ch;
    } else if (ch === ';' && !inQuote) {
      pieces.push(current);
      current = '';
    } else {
      current += ch;
    }
  }
  pieces.push(current);
  return pieces;
}

function unquote(value: string): string {
  const trimmed = value.trim();
  if (trimmed.length >= 2 && trimmed.startsWith('"') && trimmed.endsWith('"')) {
    return trimmed.slice(1, -1).replace(/\\(.)/g, '$1');
  }
  return trimmed;
}

function percentDecode(value: string, charset: string): string {
  const bytes: number[] = [];
  for (let i = 0; i < value.length; i++) {
    const hex = value.slice(i + 1, i + 3);
    if (value[i] === '%' && /^[0-9A-Fa-f]{2}$/.test(hex)) {
      bytes.push(parseInt(hex, 16));
      i += 2;
    } else {
      bytes.push(...Buffer.from(value[i], 'utf-8'));
    }
  }
  return decodeLenient(Uint8Array.from(bytes), charset || 'utf-8');
}

/**
 * Parse `value; a=b; c="d"` including RFC 2231 extended and continued
 * parameters (`name*=utf-8''...`, `name*0*=...`).
 */
export function parseHeaderValue(raw: string | undefined): ParsedHeaderValue {
  if (!raw) return { value: '', params: {} };
  const [head, ...rest] = splitParams(raw);
  const params: Record<string, string> = {};
  const extended = new Map<string, { index: number; encoded: boolean; value: string }[]>();

  for (const piece of rest) {
    const eq = piece.indexOf('=');
    if (eq === -1) continue;
    const key = piece.slice(0, eq).trim().toLowerCase();
    const value = unquote(piece.slice(eq + 1));
    if (!key) continue;

    const ext = /^([^*]+)\*(?:(\d+)\*?)?$/.exec(key);
    if (ext) {
      const encoded = key.endsWith('*');
      const sections = extended.get(ext[1]) ?? [];
      sections.push({ index: ext[2] === undefined ? 0 : parseInt(ext[2], 10), encoded, value });
      extended.set(ext[1], sections);
    } else if (!(key in params)) {
      params[key] = value;
    }
  }

  for (const [name, sections] of extended) {
    sections.sort((a, b) => a.index - b.index);
    let charset = '';
    const decoded = sections.map((section, i) => {
      if (!section.encoded) return section.value;
      let text = section.value;
      if (i === 0) {
        const match = /^([^']*)'[^']*'(.*)$/.exec(text);
        if (match) {
          charset = match[1];
          text = match[2];
        }
      }
      return percentDecode(text, charset);
    });
    params[name] = decoded.join('');
  }

  return { value: head.trim().toLowerCase(), params };
}

// ─── Body parsing ────────────────────────────────────────────────────

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Byte ranges of each section between `--boundary` delimiter lines, or
 * `null` if the boundary never appears.
 */
function splitMultipartBody(binary: string, boundary: string): Array<[number, number]> | null {
  const delimiter = new RegExp(`(^|\\r?\\n)--${escapeRegExp(boundary)}(--)?[ \\t]*(?=\\r?\\n|$)`, 'g');
  const sections: Array<[number, number]> = [];
  let sectionStart = -1;
  let found = false;

  for (let match = delimiter.exec(binary); match; match = delimiter.exec(binary)) {
    found = true;
    if (sectionStart !== -1) sections.push([sectionStart, match.index]);
    if (match[2]) {
      sectionStart = -1;
      break;
    }
    let next = match.index + match[0].length;
    if (binary[next] === '\r') next++;
    if (binary[next] === '\n') next++;
    sectionStart = next;
  }

  // Missing close delimiter: keep whatever follows the last one
  if (sectionStart !== -1 && sectionStart < binary.length) {
    sections.push([sectionStart, binary.length]);
  }
  return found ? sections : null;
}

function decodeTransfer(body: Buffer, encoding: string): Buffer {
  switch (encoding) {
    case 'base64':
      return decodeBase64(body.toString('latin1'));
    case 'quoted-printable':
      return decodeQuotedPrintable(body.toString('latin1'));
    default:
      return body;
  }
}

function parseNode(raw: Buffer, depth: number): MessagePart {
  const binary = raw.toString('latin1');
  const { headers, bodyStart } = splitHeaders(binary);
  const body = raw.subarray(bodyStart);
  const probe = { headers };

  const contentType = parseHeaderValue(getHeader(probe, 'content-type'));
  const disposition = parseHeaderValue(getHeader(probe, 'content-disposition'));
  const transferEncoding = (getHeader(probe, 'content-transfer-encoding') ?? '').trim().toLowerCase();
  const mediaType = contentType.value.includes('/') ? contentType.value : 'text/plain';
  const filename = disposition.params['filename'] || contentType.params['name'] || undefined;

  const part: MessagePart = {
    kind: 'leaf',
    headers,
    mediaType,
    charset: contentType.params['charset'] || undefined,
    disposition: disposition.value,
    filename,
    content: body,
    children: [],
  };

  if (depth >= MAX_DEPTH) {
    part.content = decodeTransfer(body, transferEncoding);
    return part;
  }

  const boundary = contentType.params['boundary'];
  if (mediaType.startsWith('multipart/') && boundary) {
    const sections = splitMultipartBody(body.toString('latin1'), boundary);
    if (sections) {
      part.kind = 'multipart';
      part.content = Buffer.alloc(0);
      part.children = sections.map(([start, end]) => parseNode(body.subarray(start, end), depth + 1));
      return part;
    }
  }

  part.content = decodeTransfer(body, transferEncoding);

  if (mediaType === 'message/rfc822' && part.disposition !== 'attachment') {
    part.kind = 'message';
    part.children = [parseNode(part.content, depth + 1)];
  }

  return part;
}

/** Parse one raw RFC 822 message into its part tree. */
export function parseMessage(raw: Buffer): MessagePart {
  return parseNode(raw, 0);
}

/** Depth-first, pre-order walk over a part and all its descendants. */
export function* walkParts(part: MessagePart): Generator<MessagePart> {
  yield part;
  for (const child of part.children) {
    yield* walkParts(child);
  }
}

export function isMultipart(part: MessagePart): boolean {
  return part.kind !== 'leaf';
}
