const ENTITIES: Record<string, string> = {
  '&amp;': '&',
  '&lt;': '<',
  '&gt;': '>',
  '&quot;': '"',
  '&#39;': "'",
  '&apos;': "'",
  '&nbsp;': ' ',
};

/**
 * Cleans a title or snippet returned by a search provider before it is shown
 * or summarized: markup, entities, control characters, bare URLs and
 * typographic punctuation are normalized and whitespace collapsed.
 */
export function sanitizeSnippet(text: string | null | undefined): string {
  if (!text) return '';

  return text
    .replace(/<[^>]*>/g, ' ') // Remove HTML tags
    .replace(/&(?:amp|lt|gt|quot|#39|apos|nbsp);/g, (entity) => ENTITIES[entity] ?? ' ')
    .replace(/https?:\/\/\S+/g, '') // Remove URLs
    .replace(/[\x00-\x1F\x7F-\x9F\u200B\u2028-\u202F\u205F\u2060\u3000\uFEFF]/g, ' ') // Control chars and non-printables (ZWJ/ZWNJ kept for Indic conjuncts)
    .replace(/[\u2018\u2019]/g, "'") // Smart quotes to straight quotes
    .replace(/[\u201C\u201D]/g, '"')
    .replace(/[\u2013\u2014]/g, '-') // En/em dashes to hyphens
    .replace(/\u2026/g, '...') // Ellipsis
    .replace(/[\u00A0\u1680\u2000-\u200A]+/g, ' ') // Normalize whitespace
    .replace(/\s+/g, ' ')
    .trim();
}

/**
 * Host name of a result link without a leading `www.`.
 */
export function sourceOf(link: string): string {
  try {
    const host = new URL(link).hostname;
    return host ? host.replace(/^www\./, '') : 'unknown';
  } catch {
    return 'unknown';
  }
}
