import type { RemoteEntry } from '../types.js';

// <a href="file.zip">, <a class="x" href='sub/'>, <A HREF=plain.txt>
const ANCHOR_PATTERN = /<a\b[^>]*?\bhref\s*=\s*(?:"([^"]*)"|'([^']*)'|([^\s"'>]+))[^>]*>/gi;

const NAVIGATION_HREFS = new Set(['../', './']);

const ENTITIES: Record<string, string> = {
  '&amp;': '&',
  '&quot;': '"',
  '&#39;': "'",
  '&apos;': "'",
  '&lt;': '<',
  '&gt;': '>'
};

/**
 * Extract child entries from an HTML directory index.
 * Parent/self navigation links are dropped; an href ending in "/" is a directory.
 */
export function parseListing(html: string): RemoteEntry[] {
  const entries: RemoteEntry[] = [];

  for (const match of html.matchAll(ANCHOR_PATTERN)) {
    const raw = match[1] ?? match[2] ?? match[3];
    if (raw === undefined) continue;

    const href = decodeEntities(raw.trim());
    if (href === '' || NAVIGATION_HREFS.has(href)) continue;

    entries.push({
      name: href,
      isDirectory: href.endsWith('/')
    });
  }

  return entries;
}

function decodeEntities(value: string): string {
  return value.replace(/&(?:amp|quot|#39|apos|lt|gt);/g, (entity) => ENTITIES[entity] ?? entity);
}

/**
 * Percent-decode a URL segment, falling back to the raw text on malformed escapes
 */
export function safeDecodeURIComponent(value: string): string {
  try {
    return decodeURIComponent(value);
  } catch {
    return value;
  }
}
