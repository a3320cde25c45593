/**
 * Byte-to-text helpers shared by the header decoder, the MIME tree and the
 * body resolver. Encodings are tried as an ordered list, strict first.
 */

export interface DecodedText {
  text: string;
  encoding: string;
}

function normalizeLabel(label: string): string {
  return label.trim().toLowerCase();
}

/**
 * Try each encoding in turn with strict decoding. Unknown labels and
 * invalid byte sequences move on to the next candidate; `null` means
 * every candidate failed.
 */
export function decodeWithFallback(
  bytes: Uint8Array,
  encodings: readonly (string | undefined)[]
): DecodedText | null {
  const tried = new Set<string>();
  for (const candidate of encodings) {
    if (!candidate) continue;
    const label = normalizeLabel(candidate);
    if (tried.has(label)) continue;
    tried.add(label);
    try {
      return { text: new TextDecoder(label, { fatal: true }).decode(bytes), encoding: label };
    } catch {
      // unknown label or invalid bytes for this encoding: try the next one
      continue;
    }
  }
  return null;
}

/** Non-strict decode: invalid sequences become U+FFFD, unknown labels use UTF-8. */
export function decodeLenient(bytes: Uint8Array, encoding: string): string {
  let decoder: TextDecoder;
  try {
    decoder = new TextDecoder(normalizeLabel(encoding));
  } catch {
    decoder = new TextDecoder('utf-8');
  }
  return decoder.decode(bytes);
}

export function isKnownEncoding(label: string): boolean {
  try {
    new TextDecoder(normalizeLabel(label));
    return true;
  } catch {
    return false;
  }
}

/** Quoted-printable body or Q-word bytes. `input` must be a byte-per-char string. */
export function decodeQuotedPrintable(input: string): Buffer {
  const text = input.replace(/=(?:\r?\n|$)/g, '');
  const bytes: number[] = [];
  for (let i = 0; i < text.length; i++) {
    const ch = text.charCodeAt(i);
    if (ch === 0x3d) {
      const hex = text.slice(i + 1, i + 3);
      if (/^[0-9A-Fa-f]{2}$/.test(hex)) {
        bytes.push(parseInt(hex, 16));
        i += 2;
        continue;
      }
    }
    bytes.push(ch & 0xff);
  }
  return Buffer.from(bytes);
}

export function decodeBase64(input: string): Buffer {
  return Buffer.from(input.replace(/[^A-Za-z0-9+/=_-]/g, ''), 'base64');
}
