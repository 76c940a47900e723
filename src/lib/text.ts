/**
 * Case- and diacritic-insensitive form used for every lookup.
 * Latin combining accents and the Devanagari nukta are dropped, chandrabindu
 * folds into anusvara (कहाँ / कहां), punctuation becomes a single space.
 */
export function normalizeText(text: string): string {
  return text
    .normalize('NFD')
    .replace(/[\u0300-\u036f]/g, '')
    .normalize('NFC')
    .replace(/\u093c/g, '')
    .replace(/\u0901/g, '\u0902')
    .toLowerCase()
    .replace(/[^\p{L}\p{M}\p{N}]+/gu, ' ')
    .trim();
}

export function tokenize(text: string): string[] {
  const normalized = normalizeText(text);
  return normalized ? normalized.split(' ') : [];
}

export function endsWithLatinLetter(text: string): boolean {
  return /\p{Script=Latin}$/u.test(text);
}

/**
 * Finds `phrase` inside `haystack` (both already normalized) starting on a
 * word boundary. Latin phrases must also end on one, so "holi" does not
 * match "holiday"; Indic phrases may carry inflection suffixes unless
 * `wholeWord` is set.
 */
export function findPhrase(haystack: string, phrase: string, wholeWord = false): number {
  if (!phrase) return -1;
  const strictEnd = wholeWord || endsWithLatinLetter(phrase);
  let from = 0;
  while (from <= haystack.length - phrase.length) {
    const idx = haystack.indexOf(phrase, from);
    if (idx === -1) return -1;
    const startOk = idx === 0 || haystack[idx - 1] === ' ';
    const end = idx + phrase.length;
    const endOk = !strictEnd || end === haystack.length || haystack[end] === ' ';
    if (startOk && endOk) return idx;
    from = idx + 1;
  }
  return -1;
}

export function round2(value: number): number {
  return Math.round(value * 100) / 100;
}
