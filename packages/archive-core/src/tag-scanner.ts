/**
 * Minimal tag scanner for the sanitizer rules. Works on serialized markup;
 * quoted attribute values may contain `>`. Malformed markup is matched
 * permissively, the way a regex pass would, with no DOM.
 */

const START_TAG = /<([a-zA-Z][a-zA-Z0-9:-]*)(?:[^>"']|"[^"]*"|'[^']*')*>/g;

export function blockPattern(tagName: string): RegExp {
  return new RegExp(`<${tagName}\\b[^>]*>[\\s\\S]*?<\\/${tagName}\\s*>`, 'gi');
}

/**
 * Rewrite every start tag, or only those named `tagName`. The callback gets
 * the full tag text and returns its replacement.
 */
export function replaceTags(
  html: string,
  tagName: string | null,
  rewrite: (tag: string) => string
): string {
  const wanted = tagName?.toLowerCase() ?? null;
  return html.replace(START_TAG, (tag, name: string) => {
    if (wanted !== null && name.toLowerCase() !== wanted) return tag;
    return rewrite(tag);
  });
}

/** Value of an attribute in a start tag, quoted or bare; undefined if absent. */
export function getAttribute(tag: string, name: string): string | undefined {
  const pattern = new RegExp(`[\\s/"']${name}\\s*=\\s*(?:"([^"]*)"|'([^']*)'|([^\\s"'>]+))`, 'i');
  const match = pattern.exec(tag);
  if (!match) return undefined;
  return match[1] ?? match[2] ?? match[3];
}
