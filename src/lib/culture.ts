import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { findPhrase, normalizeText } from './text';
import { CULTURAL_CATEGORIES, LANGUAGES, type CulturalMatch, type Language } from './types';

const languageSchema = z.enum(LANGUAGES);

const entrySchema = z.object({
  id: z.string().min(1),
  category: z.enum(CULTURAL_CATEGORIES),
  canonicalName: z.string().min(1),
  names: z.record(languageSchema, z.array(z.string().min(1))),
  metadata: z.record(z.string()).default({}),
  practices: z.record(languageSchema, z.array(z.string())).default({}),
});

const knowledgeBaseSchema = z.object({
  version: z.string().min(1),
  entries: z.array(entrySchema).min(1),
});

export type KnowledgeEntry = z.infer<typeof entrySchema>;
export type KnowledgeBaseData = z.infer<typeof knowledgeBaseSchema>;

interface IndexedPhrase {
  phrase: string;
  entryId: string;
}

const DETECTED_LANGUAGE_CONFIDENCE = 1;
const OTHER_LANGUAGE_CONFIDENCE = 0.8;
// Names this short from another language only match as whole words
// (Marathi "ताप" inside Hindi "तापमान").
const SHORT_NAME_CODE_POINTS = 3;

/**
 * Read-only cultural knowledge base. Built once at startup; `match` keeps no
 * state between calls so any number of requests may share one instance.
 */
export class KnowledgeBase {
  readonly version: string;
  private readonly entries: ReadonlyMap<string, KnowledgeEntry>;
  private readonly index: ReadonlyMap<Language, readonly IndexedPhrase[]>;

  constructor(data: KnowledgeBaseData) {
    this.version = data.version;

    const entries = new Map<string, KnowledgeEntry>();
    for (const entry of data.entries) {
      if (entries.has(entry.id)) throw new Error(`Duplicate knowledge base entry id: ${entry.id}`);
      entries.set(entry.id, Object.freeze(entry));
    }
    this.entries = entries;

    const index = new Map<Language, IndexedPhrase[]>();
    for (const language of LANGUAGES) {
      const phrases: IndexedPhrase[] = [];
      for (const entry of entries.values()) {
        for (const name of entry.names[language] ?? []) {
          const phrase = normalizeText(name);
          if (phrase) phrases.push({ phrase, entryId: entry.id });
        }
      }
      // Longest phrase first so "करवा चौथ" wins over a shorter alias.
      phrases.sort((a, b) => b.phrase.length - a.phrase.length);
      index.set(language, phrases);
    }
    this.index = index;
  }

  static fromData(raw: unknown): KnowledgeBase {
    return new KnowledgeBase(knowledgeBaseSchema.parse(raw));
  }

  static fromFile(path: string): KnowledgeBase {
    const raw: unknown = JSON.parse(readFileSync(path, 'utf8'));
    return KnowledgeBase.fromData(raw);
  }

  get size(): number {
    return this.entries.size;
  }

  all(): KnowledgeEntry[] {
    return [...this.entries.values()];
  }

  get(id: string): KnowledgeEntry | undefined {
    return this.entries.get(id);
  }

  /**
   * Looks up registered phrases in `rawText`. The detected language's names
   * are tried first; names from other languages still match at a lower
   * confidence (e.g. "Diwali" typed inside a Hindi sentence).
   */
  match(rawText: string, language: Language): CulturalMatch[] {
    const text = normalizeText(rawText);
    if (!text) return [];

    const found = new Map<string, { match: CulturalMatch; position: number }>();
    const order: Language[] = [language, ...LANGUAGES.filter((l) => l !== language)];

    for (const lang of order) {
      const confidence = lang === language ? DETECTED_LANGUAGE_CONFIDENCE : OTHER_LANGUAGE_CONFIDENCE;
      for (const { phrase, entryId } of this.index.get(lang) ?? []) {
        if (found.has(entryId)) continue;
        const wholeWord = lang !== language && Array.from(phrase).length <= SHORT_NAME_CODE_POINTS;
        const position = findPhrase(text, phrase, wholeWord);
        if (position === -1) continue;
        const entry = this.entries.get(entryId);
        if (entry) found.set(entryId, { match: this.toMatch(entry, language, phrase, confidence), position });
      }
    }

    return [...found.values()]
      .sort((a, b) => b.match.confidence - a.match.confidence || a.position - b.position)
      .map(({ match }) => match);
  }

  localizedName(entry: KnowledgeEntry, language: Language): string {
    return entry.names[language]?.[0] ?? entry.canonicalName;
  }

  private toMatch(entry: KnowledgeEntry, language: Language, phrase: string, confidence: number): CulturalMatch {
    const localizedNames: Partial<Record<Language, string>> = {};
    for (const lang of LANGUAGES) {
      const name = entry.names[lang]?.[0];
      if (name) localizedNames[lang] = name;
    }
    return {
      id: entry.id,
      category: entry.category,
      canonicalName: entry.canonicalName,
      localizedNames,
      metadata: { ...entry.metadata },
      practices: [...(entry.practices[language] ?? entry.practices.english ?? [])],
      matchedPhrase: phrase,
      confidence,
    };
  }
}
