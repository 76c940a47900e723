import { readFileSync } from 'node:fs';
import { z } from 'zod';
import type { Language } from './types';

const languageInfoSchema = z.object({
  code: z.string(),
  name: z.string(),
  script: z.string(),
  speakers: z.string(),
  regions: z.array(z.string()),
  culturalDomains: z.array(z.string()),
  examples: z.array(z.string()).min(1),
});

const catalogSchema = z.object({
  hindi: languageInfoSchema,
  telugu: languageInfoSchema,
  marathi: languageInfoSchema,
  english: languageInfoSchema,
});

export type LanguageInfo = z.infer<typeof languageInfoSchema>;
export type LanguageCatalog = Readonly<Record<Language, LanguageInfo>>;

// Display metadata and sample queries for clients.
export function loadLanguageCatalog(path: string): LanguageCatalog {
  const raw: unknown = JSON.parse(readFileSync(path, 'utf8'));
  return Object.freeze(catalogSchema.parse(raw));
}
