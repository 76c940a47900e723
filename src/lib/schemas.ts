import { z } from 'zod';
import {
  CULTURAL_CATEGORIES,
  INTENT_LABELS,
  LANGUAGES,
  type CulturalMatch,
  type LanguageDetectionResult,
  type NodeResult,
  type RealWorldData,
  type ResponseEnvelope,
  type ResponsePayload,
} from './types';

export const languageSchema = z.enum(LANGUAGES);

const score = z.number().min(0).max(1);

export const detectionSchema: z.ZodType<LanguageDetectionResult> = z.object({
  detectedLanguage: languageSchema,
  primaryScript: z.enum(['devanagari', 'telugu', 'latin', 'unknown']),
  confidence: score,
  scriptRatios: z.object({ devanagari: score, telugu: score, latin: score }),
});

export const culturalMatchSchema: z.ZodType<CulturalMatch> = z.object({
  id: z.string(),
  category: z.enum(CULTURAL_CATEGORIES),
  canonicalName: z.string(),
  localizedNames: z.record(languageSchema, z.string()),
  metadata: z.record(z.string()),
  practices: z.array(z.string()),
  matchedPhrase: z.string(),
  confidence: score,
});

const resourceLinkSchema = z.object({
  title: z.string(),
  link: z.string(),
  source: z.string(),
  snippet: z.string(),
});

const composedFields = {
  culturalIntroduction: z.string(),
  mainContent: z.string(),
  practicalAdvice: z.string(),
  additionalResources: z.array(resourceLinkSchema),
  confidenceLevel: z.enum(['high', 'medium', 'low']),
};

export const payloadSchema: z.ZodType<ResponsePayload> = z.discriminatedUnion('kind', [
  z.object({
    kind: z.literal('cultural_guide'),
    title: z.string(),
    content: z.string(),
    culturalSignificance: z.string(),
    traditionalPractices: z.array(z.string()),
  }),
  z.object({
    kind: z.literal('healthcare_advice'),
    condition: z.string(),
    traditionalRemedies: z.array(z.string()),
    ayurvedicApproach: z.string(),
    disclaimer: z.string(),
  }),
  z.object({
    kind: z.literal('general_response'),
    content: z.string(),
    suggestion: z.string(),
    relatedTopics: z.array(z.string()),
  }),
  z.object({ kind: z.literal('enhanced_cultural_response'), ...composedFields }),
  z.object({ kind: z.literal('real_world_response'), ...composedFields }),
]);

export const nodeResultSchema: z.ZodType<NodeResult> = z.object({
  nodeId: z.string().min(1),
  language: languageSchema,
  intent: z.enum(INTENT_LABELS),
  responsePayload: payloadSchema,
  scriptInfo: detectionSchema,
  confidence: score,
});

export const searchDocumentSchema = z.object({
  title: z.string(),
  snippet: z.string(),
  link: z.string(),
  source: z.string(),
});

export const realWorldDataSchema: z.ZodType<RealWorldData> = z.object({
  searchResults: z.array(searchDocumentSchema),
  aiSummary: z
    .object({
      summaryText: z.string(),
      keyInsights: z.array(z.string()),
      confidenceScore: score,
      method: z.enum(['extractive', 'abstractive']),
      sourceCount: z.number().int().nonnegative(),
    })
    .optional(),
});

export const responseEnvelopeSchema: z.ZodType<ResponseEnvelope> = z.object({
  query: z.string(),
  detectedLanguage: languageSchema,
  processingTimeMs: z.number().nonnegative(),
  timestamp: z.string().datetime(),
  response: z.object({
    intent: z.enum(INTENT_LABELS),
    confidence: score,
    script: detectionSchema,
    nodeId: z.string(),
    culturalContext: z
      .object({
        primary: z.string(),
        categories: z.array(z.enum(CULTURAL_CATEGORIES)),
        matches: z.array(culturalMatchSchema),
      })
      .optional(),
    realWorldData: realWorldDataSchema.optional(),
    degraded: z.object({ reason: z.string(), note: z.string() }).optional(),
    response: payloadSchema,
  }),
});

/**
 * Body of `POST /api/v1/query`. `query` is accepted as an alias of `text`.
 * The language is kept as a plain string so an unknown value can be reported
 * as unsupported rather than as a malformed request.
 */
export const queryRequestSchema = z
  .object({
    text: z.string().optional(),
    query: z.string().optional(),
    language: z.string().trim().toLowerCase().optional(),
  })
  .transform(({ text, query, language }) => ({ text: text ?? query ?? '', language: language || undefined }));

export type QueryRequest = z.infer<typeof queryRequestSchema>;

export const detectRequestSchema = z
  .object({ text: z.string().optional(), query: z.string().optional() })
  .transform(({ text, query }) => ({ text: text ?? query ?? '' }));

export const SEARCH_APPROACHES = ['lightweight', 'agentic', 'hybrid'] as const;
export type SearchApproach = (typeof SEARCH_APPROACHES)[number];

/** Body of `POST /api/v1/agentic-search`. A missing language means detect it. */
export const agenticSearchRequestSchema = z
  .object({
    text: z.string().optional(),
    query: z.string().optional(),
    language: z.string().trim().toLowerCase().optional(),
    approach: z.enum(SEARCH_APPROACHES).default('hybrid'),
    maxResults: z.coerce.number().int().min(1).max(10).default(3),
  })
  .transform(({ text, query, language, approach, maxResults }) => ({
    text: text ?? query ?? '',
    language: language && language !== 'auto' ? language : undefined,
    approach,
    maxResults,
  }));

export type AgenticSearchRequest = z.infer<typeof agenticSearchRequestSchema>;
