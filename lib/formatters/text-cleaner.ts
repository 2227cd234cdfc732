/**
 * Text cleanup for titles and summaries pulled out of feeds and listing pages
 */

/**
 * Decode HTML entities (&nbsp;, &amp;, etc.)
 */
export function decodeHTMLEntities(text: string): string {
  const entities: Record<string, string> = {
    '&nbsp;': ' ',
    '&lt;': '<',
    '&gt;': '>',
    '&quot;': '"',
    '&#039;': "'",
    '&apos;': "'",
    '&ndash;': '–',
    '&mdash;': '—',
    '&hellip;': '…',
    '&ldquo;': '"',
    '&rdquo;': '"',
    '&lsquo;': '\u2018',
    '&rsquo;': '\u2019',
  };

  let decoded = text;
  for (const [entity, char] of Object.entries(entities)) {
    decoded = decoded.replace(new RegExp(entity, 'g'), char);
  }

  // Handle numeric entities (&#123;, &#x1a2b;)
  decoded = decoded.replace(/&#(\d+);/g, (_, code: string) =>
    String.fromCharCode(parseInt(code, 10))
  );
  decoded = decoded.replace(/&#x([0-9a-f]+);/gi, (_, code: string) =>
    String.fromCharCode(parseInt(code, 16))
  );

  // Last, so "&amp;lt;" stays "&lt;"
  return decoded.replace(/&amp;/g, '&');
}

/**
 * Truncate text to a maximum length
 * Breaks at word boundaries and adds ellipsis
 */
export function truncateText(text: string, maxLength: number): string {
  if (text.length <= maxLength) return text;

  // Find the last space before maxLength
  const truncated = text.substring(0, maxLength);
  const lastSpace = truncated.lastIndexOf(' ');

  if (lastSpace > 0) {
    return truncated.substring(0, lastSpace) + '…';
  }

  return truncated + '…';
}

/**
 * Extract plain text from HTML
 * Quick and dirty HTML stripping
 */
export function stripHTML(html: string): string {
  return html
    .replace(/<script\b[^<]*(?:(?!<\/script>)<[^<]*)*<\/script>/gi, '')
    .replace(/<style\b[^<]*(?:(?!<\/style>)<[^<]*)*<\/style>/gi, '')
    .replace(/<[^>]+>/g, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

/**
 * Single-line text: every whitespace run collapsed to one space.
 * Entities are left alone; cheerio's `.text()` has already decoded them.
 */
export function collapseText(text: string | undefined | null): string {
  if (!text) return '';
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * Plain-text summary from an HTML or text fragment, cut at a word boundary
 */
export function toSummary(fragment: string | undefined | null, maxLength = 300): string | undefined {
  if (!fragment) return undefined;
  const text = collapseText(decodeHTMLEntities(stripHTML(fragment)));
  if (!text) return undefined;
  return truncateText(text, maxLength);
}
