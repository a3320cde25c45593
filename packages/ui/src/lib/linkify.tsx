import type { ReactNode } from 'react';

const URL_PATTERN = /(https?:\/\/[^\s<>"]+|www\.[^\s<>"]+)/g;

/**
 * Split plain text into text runs and anchors for every `http(s)://` or
 * `www.` URL. Text is left to React for escaping.
 */
export function linkifyText(text: string): ReactNode[] {
  const nodes: ReactNode[] = [];
  let lastEnd = 0;

  for (const match of text.matchAll(URL_PATTERN)) {
    const start = match.index ?? 0;
    const url = match[0];
    if (start > lastEnd) nodes.push(text.slice(lastEnd, start));
    nodes.push(
      <a key={start} href={url.startsWith('http') ? url : `https://${url}`} target="_blank" rel="noopener noreferrer">
        {url}
      </a>
    );
    lastEnd = start + url.length;
  }

  if (lastEnd < text.length) nodes.push(text.slice(lastEnd));
  return nodes;
}
