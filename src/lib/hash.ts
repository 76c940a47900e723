import { createHash } from 'crypto';
import { normalizeText } from './text';

/**
 * Generates a SHA-1 hash of the input string
 */
export function sha1(input: string): string {
  return createHash('sha1').update(input).digest('hex');
}

/**
 * Cache key for search enrichment: same wording in the same language shares
 * an entry regardless of case, punctuation or spacing.
 */
export function getCacheKey(text: string, language: string): string {
  return `${language}:${sha1(normalizeText(text))}`;
}
