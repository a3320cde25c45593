import type { SanitizationStats } from '@mailshelf/shared';
import { emptySanitizationStats } from '@mailshelf/shared';
import type { SanitizerConfig } from './config';
import { silentLogger, type Logger } from './logger';
import { blockPattern, getAttribute, replaceTags } from './tag-scanner';

export const EXTERNAL_IMAGE_MARKER = '[External image - not available offline]';
export const INLINE_IMAGE_MARKER = '[Inline image removed - prevented HTML bloat]';

export const EXTERNAL_IMAGE_PLACEHOLDER =
  '<div style="padding:10px;background:#f0f0f0;border:1px dashed #ccc;' +
  'text-align:center;color:#666;font-size:12px;border-radius:4px;">' +
  `🖼️ ${EXTERNAL_IMAGE_MARKER}</div>`;

export const INLINE_IMAGE_PLACEHOLDER =
  '<div style="padding:10px;background:#fff3cd;border:1px dashed #ffc107;' +
  'text-align:center;color:#856404;font-size:12px;border-radius:4px;">' +
  `📷 ${INLINE_IMAGE_MARKER}</div>`;

export const SAFE_STYLE_ATTRIBUTE = 'style="max-width:100%;word-wrap:break-word;"';

/** Upper bound on whole-pipeline passes while looking for a fixed point. */
const MAX_PASSES = 8;

export interface RuleResult {
  html: string;
  /** How many constructs the rule removed or rewrote */
  count: number;
}

export interface SanitizeRule {
  name: string;
  stat: keyof SanitizationStats;
  isEnabled(config: SanitizerConfig): boolean;
  apply(html: string, config: SanitizerConfig): RuleResult;
}

// ─── Rules ───────────────────────────────────────────────────────────

function removeBlocks(html: string, tagNames: string[]): RuleResult {
  let count = 0;
  let result = html;
  for (const tagName of tagNames) {
    result = result.replace(blockPattern(tagName), () => {
      count++;
      return '';
    });
  }
  return { html: result, count };
}

export function removeScripts(html: string): RuleResult {
  const blocks = removeBlocks(html, ['script', 'noscript']);
  let count = blocks.count;
  // Unpaired open or close tags left behind by malformed markup
  const result = blocks.html.replace(/<\/?(?:no)?script\b[^>]*>/gi, () => {
    count++;
    return '';
  });
  return { html: result, count };
}

export function removeEventHandlers(html: string): RuleResult {
  let count = 0;
  const result = replaceTags(html, null, (tag) =>
    tag.replace(/[\s/]*(?<=[\s/"'])on\w+\s*=\s*(?:"[^"]*"|'[^']*')/gi, () => {
      count++;
      return '';
    })
  );
  return { html: result, count };
}

export function neutralizeJavascriptLinks(html: string): RuleResult {
  let count = 0;
  const result = replaceTags(html, null, (tag) =>
    tag.replace(
      /([\s/"'])href\s*=\s*(?:"\s*javascript:[^"]*"|'\s*javascript:[^']*'|javascript:[^\s>]*)/gi,
      (_match, space: string) => {
        count++;
        return `${space}href="#"`;
      }
    )
  );
  return { html: result, count };
}

function replaceImages(
  html: string,
  shouldReplace: (tag: string, src: string) => boolean,
  replacement: string
): RuleResult {
  let count = 0;
  const result = replaceTags(html, 'img', (tag) => {
    const src = getAttribute(tag, 'src');
    if (src === undefined || !shouldReplace(tag, src.trim())) return tag;
    count++;
    return replacement;
  });
  return { html: result, count };
}

export function replaceExternalImages(html: string): RuleResult {
  return replaceImages(html, (_tag, src) => /^https?:\/\//i.test(src), EXTERNAL_IMAGE_PLACEHOLDER);
}

/** Inline data images whose whole `<img>` tag is longer than `maxLength` characters. */
export function stripLargeBase64Images(html: string, maxLength: number): RuleResult {
  return replaceImages(
    html,
    (tag, src) => /^data:image\//i.test(src) && tag.length > maxLength,
    INLINE_IMAGE_PLACEHOLDER
  );
}

export function removeStyleBlocks(html: string): RuleResult {
  return removeBlocks(html, ['style']);
}

export function truncateLongStyles(html: string, maxLength: number): RuleResult {
  let count = 0;
  const result = replaceTags(html, null, (tag) =>
    tag.replace(/([\s/"'])(style\s*=\s*(?:"[^"]*"|'[^']*'))/gi, (match, space: string, attribute: string) => {
      // The replacement itself may exceed a small limit
      if (attribute.length <= maxLength || attribute === SAFE_STYLE_ATTRIBUTE) return match;
      count++;
      return `${space}${SAFE_STYLE_ATTRIBUTE}`;
    })
  );
  return { html: result, count };
}

export function removeLinkElements(html: string): RuleResult {
  let count = 0;
  const result = replaceTags(html, 'link', () => {
    count++;
    return '';
  });
  return { html: result, count };
}

function isOnePixel(value: string | undefined): boolean {
  return value !== undefined && /^1(?:px)?$/i.test(value.trim());
}

export function removeTrackingPixels(html: string): RuleResult {
  let count = 0;
  const result = replaceTags(html, 'img', (tag) => {
    if (!isOnePixel(getAttribute(tag, 'width')) || !isOnePixel(getAttribute(tag, 'height'))) return tag;
    count++;
    return '';
  });
  return { html: result, count };
}

/** Rules in application order; later rules rely on earlier ones having run. */
export const SANITIZE_RULES: readonly SanitizeRule[] = [
  {
    name: 'scripts',
    stat: 'scriptsRemoved',
    isEnabled: (config) => config.stripScripts,
    apply: (html) => removeScripts(html),
  },
  {
    name: 'event-handlers',
    stat: 'eventHandlersRemoved',
    isEnabled: (config) => config.stripEventHandlers,
    apply: (html) => removeEventHandlers(html),
  },
  {
    name: 'javascript-links',
    stat: 'javascriptLinksNeutralized',
    isEnabled: (config) => config.neutralizeJavascriptLinks,
    apply: (html) => neutralizeJavascriptLinks(html),
  },
  {
    name: 'external-images',
    stat: 'externalImagesReplaced',
    isEnabled: (config) => config.stripExternalImages,
    apply: (html) => replaceExternalImages(html),
  },
  {
    name: 'base64-images',
    stat: 'base64ImagesStripped',
    isEnabled: (config) => config.stripBase64Images,
    apply: (html, config) => stripLargeBase64Images(html, config.base64ImageMaxLength),
  },
  {
    name: 'style-blocks',
    stat: 'styleBlocksRemoved',
    isEnabled: (config) => config.stripStyles,
    apply: (html) => removeStyleBlocks(html),
  },
  {
    name: 'style-attributes',
    stat: 'styleAttributesTruncated',
    isEnabled: (config) => config.stripStyles,
    apply: (html, config) => truncateLongStyles(html, config.maxStyleAttributeLength),
  },
  {
    name: 'link-elements',
    stat: 'linkElementsRemoved',
    isEnabled: (config) => config.stripLinkElements,
    apply: (html) => removeLinkElements(html),
  },
  {
    name: 'tracking-pixels',
    stat: 'trackingPixelsRemoved',
    isEnabled: (config) => config.stripTrackingPixels,
    apply: (html) => removeTrackingPixels(html),
  },
];

// ─── Sanitizer ───────────────────────────────────────────────────────

/**
 * Cleans email HTML for offline, script-free viewing. Output depends only
 * on the input and the rule configuration; the counters are for reporting.
 */
export class ContentSanitizer {
  private stats: SanitizationStats = emptySanitizationStats();

  constructor(
    private readonly config: SanitizerConfig,
    private readonly logger: Logger = silentLogger
  ) {}

  sanitize(html: string): string {
    if (!html) return '';

    // Removing one construct can splice together another (`<scr<script></script>ipt>`),
    // so passes repeat until the output stops changing.
    let current = html;
    for (let pass = 0; pass < MAX_PASSES; pass++) {
      const next = this.runRules(current);
      if (next === current) break;
      current = next;
    }
    return current;
  }

  getStats(): SanitizationStats {
    return { ...this.stats };
  }

  resetStats(): void {
    this.stats = emptySanitizationStats();
  }

  private runRules(html: string): string {
    let current = html;
    for (const rule of SANITIZE_RULES) {
      if (!rule.isEnabled(this.config)) continue;
      const { html: next, count } = rule.apply(current, this.config);
      if (count > 0) {
        this.stats[rule.stat] += count;
        this.logger.debug(`Sanitizer rule ${rule.name} changed ${count} construct(s)`);
      }
      current = next;
    }
    return current;
  }
}
