const SCRIPT_BLOCK = /<script\b[^>]*>[\s\S]*?<\/script\s*>/gi;
const STYLE_BLOCK = /<style\b[^>]*>[\s\S]*?<\/style\s*>/gi;
const HTML_COMMENT = /<!--[\s\S]*?-->/g;
const HTML_TAG = /<[^>]+>/g;

const NAMED_ENTITIES: Record<string, string> = {
  '&nbsp;': ' ',
  '&amp;': '&',
  '&lt;': '<',
  '&gt;': '>',
  '&quot;': '"',
  '&#39;': "'",
  '&apos;': "'",
};

function decodeEntities(text: string): string {
  return text
    .replace(/&(?:nbsp|amp|lt|gt|quot|apos|#39);/gi, (entity) => NAMED_ENTITIES[entity.toLowerCase()] ?? entity)
    .replace(/&#(\d+);/g, (entity, code: string) => fromCodePoint(parseInt(code, 10)) ?? entity)
    .replace(/&#x([0-9a-f]+);/gi, (entity, code: string) => fromCodePoint(parseInt(code, 16)) ?? entity);
}

function fromCodePoint(code: number): string | undefined {
  return Number.isInteger(code) && code > 0 && code <= 0x10ffff ? String.fromCodePoint(code) : undefined;
}

/** Plain-text rendering of an HTML body: no scripts, styles or tags, whitespace collapsed. */
export function htmlToPlainText(html: string): string {
  if (!html) return '';
  const text = html
    .replace(SCRIPT_BLOCK, '')
    .replace(STYLE_BLOCK, '')
    .replace(HTML_COMMENT, '')
    .replace(HTML_TAG, ' ');
  return decodeEntities(text).replace(/\s+/g, ' ').trim();
}
