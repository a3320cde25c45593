import { decodeBase64, decodeLenient, decodeQuotedPrintable, decodeWithFallback } from './encoding';

const ENCODED_WORD = /=\?([^?\s]+)\?([BbQq])\?([^?\s]*)\?=/g;

function decodeWordBytes(scheme: string, payload: string): Buffer {
  if (scheme.toUpperCase() === 'B') return decodeBase64(payload);
  return decodeQuotedPrintable(payload.replace(/_/g, ' '));
}

function decodeWord(charset: string, scheme: string, payload: string, defaultCharset: string): string {
  // RFC 2231 language suffix: "utf-8*en"
  const declared = charset.split('*')[0];
  const bytes = decodeWordBytes(scheme, payload);
  return decodeWithFallback(bytes, [declared])?.text ?? decodeLenient(bytes, defaultCharset);
}

/**
 * Decode RFC 2047 encoded words (`=?UTF-8?Q?...?=`) into Unicode.
 *
 * Literal text is kept as-is; whitespace between two adjacent encoded words
 * is dropped. An unknown or lying charset falls back to `defaultCharset`
 * with invalid bytes replaced. Never throws: on an unexpected failure the
 * input comes back unchanged. Absent input yields ''.
 */
export function decodeHeader(value: string | null | undefined, defaultCharset = 'utf-8'): string {
  if (!value) return '';

  try {
    let result = '';
    let lastEnd = 0;
    let previousWasEncoded = false;

    for (const match of value.matchAll(ENCODED_WORD)) {
      const start = match.index ?? 0;
      const literal = value.slice(lastEnd, start);
      if (!(previousWasEncoded && /^\s*$/.test(literal))) {
        result += literal;
      }
      result += decodeWord(match[1], match[2], match[3], defaultCharset);
      lastEnd = start + match[0].length;
      previousWasEncoded = true;
    }

    return result + value.slice(lastEnd);
  } catch {
    return value;
  }
}
