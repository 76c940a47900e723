import type { LanguageProfile } from '../nodes/profiles';
import { fillTemplate } from '../template';
import { normalizeText, round2, tokenize } from '../text';
import type { AiSummary, SearchDocument, SummaryMethod } from '../types';
import { DEFAULT_RELIABILITY, sourceReliability } from './reliability';

export const MAX_SUMMARY_CHARS = 400;
const ABSTRACTIVE_MIN_DOCS = 3;
const ABSTRACTIVE_MIN_CHARS = 200;
const EXTRACTIVE_SENTENCES = 3;
const ABSTRACTIVE_SENTENCES = 2;
const MAX_THEMES = 3;
const MIN_KEYWORD_CHARS = 3;
const MAX_ENTITIES = 3;
const MIN_ENTITY_SENTENCE_TOKENS = 5;
const RELIABILITY_WEIGHT = 0.5;

const SENTENCE = /[^.!?।॥]+[.!?।॥]*/g;
const CAPITALIZED_RUN = /\b[A-Z][a-z]+(?: [A-Z][a-z]+)*\b/g;

/** `auto` composes a themed lead only when there is enough material. */
export type SummaryMode = 'auto' | SummaryMethod;

export interface ScoredSentence {
  text: string;
  docIndex: number;
  sentenceIndex: number;
  source: string;
  score: number;
}

export function extractKeywords(text: string, stopWords: ReadonlySet<string>): string[] {
  return tokenize(text).filter(
    (token) => Array.from(token).length >= MIN_KEYWORD_CHARS && !stopWords.has(token) && !/^\d+$/.test(token)
  );
}

export function splitSentences(text: string): string[] {
  return (text.match(SENTENCE) ?? []).map((s) => s.trim()).filter((s) => tokenize(s).length > 0);
}

/**
 * Keywords found in at least two documents, most widespread first.
 */
export function findThemes(docs: readonly SearchDocument[], stopWords: ReadonlySet<string>): string[] {
  const docFrequency = new Map<string, number>();
  for (const doc of docs) {
    for (const keyword of new Set(extractKeywords(`${doc.title} ${doc.snippet}`, stopWords))) {
      docFrequency.set(keyword, (docFrequency.get(keyword) ?? 0) + 1);
    }
  }
  // Map iteration keeps first-seen order, so the stable sort breaks ties by it.
  return [...docFrequency.entries()]
    .filter(([, count]) => count >= 2)
    .sort(([, a], [, b]) => b - a)
    .slice(0, MAX_THEMES)
    .map(([keyword]) => keyword);
}

/**
 * Grows with document count and agreement; sources more reliable than the
 * default add up to `RELIABILITY_WEIGHT × (mean - default)`.
 */
export function summaryConfidence(docCount: number, agreement: number, meanReliability = DEFAULT_RELIABILITY): number {
  const reliabilityBonus = RELIABILITY_WEIGHT * Math.max(0, meanReliability - DEFAULT_RELIABILITY);
  return round2(Math.min(1, 0.2 + 0.1 * Math.min(docCount, 5) + 0.3 * agreement + reliabilityBonus));
}

function scoreSentences(docs: readonly SearchDocument[], queryKeywords: ReadonlySet<string>): ScoredSentence[] {
  const sentences: ScoredSentence[] = [];
  docs.forEach((doc, docIndex) => {
    const reliability = sourceReliability(doc.source);
    splitSentences(doc.snippet || doc.title).forEach((text, sentenceIndex) => {
      const tokens = tokenize(text);
      const position = 1 / (1 + docIndex + sentenceIndex);
      const length = tokens.length <= 25 ? Math.min(tokens.length / 12, 1) : 25 / tokens.length;
      const overlap =
        queryKeywords.size === 0 ? 0 : new Set(tokens.filter((t) => queryKeywords.has(t))).size / queryKeywords.size;
      sentences.push({
        text,
        docIndex,
        sentenceIndex,
        source: doc.source,
        score: (0.4 * position + 0.3 * length + 0.3 * overlap) * reliability,
      });
    });
  });
  return sentences;
}

/**
 * Capitalized names from Latin-script sentences, first seen first. A single
 * capitalized word opening a sentence is not taken as a name, and a name
 * already covered by a longer one is skipped.
 */
export function extractEntities(sentences: readonly string[]): string[] {
  const entities: string[] = [];
  for (const sentence of sentences) {
    if (tokenize(sentence).length < MIN_ENTITY_SENTENCE_TOKENS) continue;
    for (const match of sentence.matchAll(CAPITALIZED_RUN)) {
      const name = match[0];
      if (match.index === 0 && !name.includes(' ')) continue;
      if (entities.some((known) => ` ${known} `.includes(` ${name} `))) continue;
      entities.push(name);
      if (entities.length === MAX_ENTITIES) return entities;
    }
  }
  return entities;
}

function byDocumentOrder(a: ScoredSentence, b: ScoredSentence): number {
  return a.docIndex - b.docIndex || a.sentenceIndex - b.sentenceIndex;
}

/**
 * Best `count` sentences, taking at most one per source until every source
 * has contributed, then filling from what is left.
 */
export function pickSentences(sentences: readonly ScoredSentence[], count: number): ScoredSentence[] {
  const ranked = [...sentences].sort((a, b) => b.score - a.score || byDocumentOrder(a, b));
  const chosen: ScoredSentence[] = [];
  const usedSources = new Set<string>();
  for (const sentence of ranked) {
    if (chosen.length === count) break;
    if (usedSources.has(sentence.source)) continue;
    chosen.push(sentence);
    usedSources.add(sentence.source);
  }
  for (const sentence of ranked) {
    if (chosen.length === count) break;
    if (!chosen.includes(sentence)) chosen.push(sentence);
  }
  return chosen.sort(byDocumentOrder);
}

/**
 * Joins whole sentences while they fit in `limit` characters. A first
 * sentence that is already too long is cut and marked with an ellipsis.
 */
export function joinWithinLimit(parts: readonly string[], limit = MAX_SUMMARY_CHARS): string {
  let text = '';
  for (const part of parts) {
    const next = text ? `${text} ${part}` : part;
    if (next.length > limit) break;
    text = next;
  }
  if (!text && parts.length > 0) text = `${parts[0].slice(0, limit - 3).trimEnd()}...`;
  return text;
}

function condense(sentence: string): string {
  return sentence
    .replace(/\([^)]*\)/g, '')
    .replace(/\s+([,.!?।])/g, '$1')
    .replace(/\s+/g, ' ')
    .trim();
}

/**
 * Condenses the top documents into a short summary. In `auto` mode it falls
 * back to extraction when there is too little material to compose a lead;
 * any mode falls back when the documents share no theme.
 */
export function summarizeDocuments(
  query: string,
  documents: readonly SearchDocument[],
  profile: LanguageProfile,
  topN: number,
  mode: SummaryMode = 'auto'
): AiSummary | undefined {
  const docs = documents.slice(0, topN);
  if (docs.length === 0) return undefined;

  const stopWords = new Set(profile.stopWords.map(normalizeText));
  const themes = findThemes(docs, stopWords);
  const themeSet = new Set(themes);
  const agreeing = docs.filter((doc) =>
    extractKeywords(`${doc.title} ${doc.snippet}`, stopWords).some((k) => themeSet.has(k))
  ).length;
  const sources = [...new Set(docs.map((doc) => doc.source))];
  const meanReliability = docs.reduce((sum, doc) => sum + sourceReliability(doc.source), 0) / docs.length;

  const sentences = scoreSentences(docs, new Set(extractKeywords(query, stopWords)));
  const snippetChars = docs.reduce((sum, doc) => sum + doc.snippet.length, 0);
  const enoughMaterial = docs.length >= ABSTRACTIVE_MIN_DOCS && snippetChars >= ABSTRACTIVE_MIN_CHARS;
  const abstractive = themes.length > 0 && (mode === 'abstractive' || (mode === 'auto' && enoughMaterial));

  const { templates } = profile;
  const summaryText = abstractive
    ? joinWithinLimit([
        fillTemplate(templates.summaryLead, { count: docs.length, themes: themes.join(', ') }),
        ...pickSentences(sentences, ABSTRACTIVE_SENTENCES).map((s) => condense(s.text)),
      ])
    : joinWithinLimit(pickSentences(sentences, EXTRACTIVE_SENTENCES).map((s) => s.text));

  const keyInsights: string[] = [];
  if (themes.length > 0) keyInsights.push(fillTemplate(templates.insightThemes, { themes: themes.join(', ') }));
  keyInsights.push(fillTemplate(templates.insightSources, { count: sources.length, sources: sources.join(', ') }));
  const entities = extractEntities(sentences.map((s) => s.text));
  if (entities.length > 0) keyInsights.push(fillTemplate(templates.insightEntities, { entities: entities.join(', ') }));

  return {
    summaryText,
    keyInsights,
    confidenceScore: summaryConfidence(docs.length, agreeing / docs.length, meanReliability),
    method: abstractive ? 'abstractive' : 'extractive',
    sourceCount: docs.length,
  };
}
