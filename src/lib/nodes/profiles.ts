import { readFileSync } from 'node:fs';
import { z } from 'zod';
import type { Language } from '../types';

const templatesSchema = z.object({
  guideTitle: z.string(),
  guideContent: z.string(),
  ayurvedicApproach: z.string(),
  disclaimer: z.string(),
  generalContent: z.string(),
  suggestion: z.string(),
  introCultural: z.string(),
  introGeneral: z.string(),
  traditionalKnowledge: z.string(),
  traditionalLabel: z.string(),
  currentLabel: z.string(),
  sourcesLabel: z.string(),
  adviceRealWorld: z.string(),
  adviceSafety: z.string(),
  degradedNote: z.string(),
  noInformation: z.string(),
  insightThemes: z.string(),
  insightSources: z.string(),
  insightEntities: z.string(),
  summaryLead: z.string(),
});

const profileSchema = z.object({
  nodeId: z.string().min(1),
  languageCode: z.string().min(2),
  searchSuffix: z.string(),
  searchLanguageRestriction: z.string(),
  stopWords: z.array(z.string()),
  transliterations: z.record(z.string()),
  templates: templatesSchema,
});

const catalogSchema = z.object({
  hindi: profileSchema,
  telugu: profileSchema,
  marathi: profileSchema,
  english: profileSchema,
});

export type LanguageProfile = z.infer<typeof profileSchema>;
export type ProfileTemplates = z.infer<typeof templatesSchema>;
export type ProfileCatalog = Readonly<Record<Language, LanguageProfile>>;

/**
 * Per-language wording, stop words and transliteration tables used by the
 * nodes, the summarizer and the synthesizer.
 */
export function loadProfiles(path: string): ProfileCatalog {
  const raw: unknown = JSON.parse(readFileSync(path, 'utf8'));
  return Object.freeze(catalogSchema.parse(raw));
}
