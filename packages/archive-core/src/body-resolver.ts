import type { EncodingConfig } from './config';
import { decodeWithFallback } from './encoding';
import { errorMessage } from './errors';
import { htmlToPlainText } from './html-text';
import { silentLogger, type Logger } from './logger';
import { isMultipart, walkParts, type MessagePart } from './mime-tree';

export interface ResolvedBody {
  plainText: string;
  htmlText: string;
  isHtml: boolean;
}

export interface BodyResolverOptions {
  encoding: EncodingConfig;
  logger?: Logger;
}

/** Opening tags that give away HTML sent as text/plain. */
const HTML_MARKERS = /<(?:html|head|body|div|table|style)\b|<!doctype/i;

export function looksLikeHtml(text: string): boolean {
  return HTML_MARKERS.test(text);
}

/**
 * Decode a part's payload: the configured primary encoding first, since a
 * declared charset is often wrong, then the declared charset, then the
 * fallback. `null` when nothing fits.
 */
export function decodePartText(part: MessagePart, encoding: EncodingConfig): string | null {
  return decodeWithFallback(part.content, [encoding.primary, part.charset, encoding.fallback])?.text ?? null;
}

interface Candidates {
  plain: string | null;
  html: string | null;
}

function collectCandidates(message: MessagePart, options: BodyResolverOptions): Candidates {
  const logger = options.logger ?? silentLogger;
  const found: Candidates = { plain: null, html: null };

  if (!isMultipart(message)) {
    const text = decodePartText(message, options.encoding);
    if (text === null) {
      logger.debug('Failed to decode single-part body', { mediaType: message.mediaType });
    } else if (message.mediaType === 'text/html') {
      found.html = text;
    } else {
      found.plain = text;
    }
    return found;
  }

  for (const part of walkParts(message)) {
    if (part.disposition === 'attachment') continue;
    if (isMultipart(part) || part.content.length === 0) continue;
    if (part.mediaType !== 'text/plain' && part.mediaType !== 'text/html') continue;

    try {
      const text = decodePartText(part, options.encoding);
      if (text === null) {
        logger.debug('Failed to decode email part', { mediaType: part.mediaType });
        continue;
      }
      // First part of each type wins
      if (part.mediaType === 'text/plain' && found.plain === null) found.plain = text;
      if (part.mediaType === 'text/html' && found.html === null) found.html = text;
    } catch (err) {
      logger.debug('Error extracting email part', { mediaType: part.mediaType, error: errorMessage(err) });
    }
  }

  return found;
}

/**
 * Pick the plain-text and HTML bodies of a message. Plain text that is
 * really HTML (promotional mail often mislabels it) is promoted to the
 * HTML body.
 */
export function resolveBody(message: MessagePart, options: BodyResolverOptions): ResolvedBody {
  const { plain, html } = collectCandidates(message, options);

  if (html) {
    return { plainText: plain ?? htmlToPlainText(html), htmlText: html, isHtml: true };
  }

  if (plain && looksLikeHtml(plain)) {
    options.logger?.debug('Detected HTML content in text/plain part');
    return { plainText: htmlToPlainText(plain), htmlText: plain, isHtml: true };
  }

  return { plainText: plain ?? '', htmlText: '', isHtml: false };
}
