import type { ProfileCatalog, ProfileTemplates } from './nodes/profiles';
import { deepFreeze } from './freeze';
import { fillTemplate } from './template';
import type {
  ConfidenceLevel,
  CulturalCategory,
  CulturalContextView,
  CulturalMatch,
  IntentClassification,
  Language,
  LanguageDetectionResult,
  NodeResult,
  Query,
  RealWorldData,
  ResourceLink,
  ResponseBody,
  ResponseEnvelope,
  ResponsePayload,
} from './types';

export const DEGRADED_NODE_ID = 'degraded_fallback';
export const DEGRADED_CONFIDENCE = 0.3;
const MAX_RESOURCES = 3;
const RESOURCE_SNIPPET_CHARS = 100;

export interface SynthesisInput {
  query: Query;
  detection: LanguageDetectionResult;
  intent: IntentClassification;
  culturalMatches: CulturalMatch[];
  /** Language the answer is worded in: the routed node's language. */
  language: Language;
  /** Absent when the language node was unavailable. */
  nodeResult?: NodeResult;
  /** Why the node was unavailable. */
  nodeFailure?: string;
  realWorldData?: RealWorldData;
  elapsedMs: number;
  now?: Date;
}

export function confidenceLevel(confidence: number): ConfidenceLevel {
  if (confidence >= 0.75) return 'high';
  if (confidence >= 0.5) return 'medium';
  return 'low';
}


function toResources(data: RealWorldData): ResourceLink[] {
  return data.searchResults.slice(0, MAX_RESOURCES).map(({ title, link, source, snippet }) => ({
    title,
    link,
    source,
    snippet: snippet.length > RESOURCE_SNIPPET_CHARS ? `${snippet.slice(0, RESOURCE_SNIPPET_CHARS).trimEnd()}...` : snippet,
  }));
}

function localName(match: CulturalMatch, language: Language): string {
  return match.localizedNames[language] ?? match.canonicalName;
}

/**
 * Merges the node answer, cultural context and live search data into the
 * final envelope. Pure apart from reading the clock when `now` is omitted.
 */
export class ResponseSynthesizer {
  constructor(private readonly profiles: ProfileCatalog) {}

  synthesize(input: SynthesisInput): ResponseEnvelope {
    const { query, detection, culturalMatches, realWorldData, nodeResult } = input;
    const templates = this.profiles[input.language].templates;
    const summaryConfidence = realWorldData?.aiSummary?.confidenceScore ?? 0;

    const base = nodeResult
      ? {
          intent: nodeResult.intent,
          confidence: realWorldData ? Math.max(nodeResult.confidence, summaryConfidence) : nodeResult.confidence,
          script: nodeResult.scriptInfo,
          nodeId: nodeResult.nodeId,
        }
      : {
          intent: input.intent.label,
          confidence: realWorldData ? Math.max(DEGRADED_CONFIDENCE, summaryConfidence) : DEGRADED_CONFIDENCE,
          script: detection,
          nodeId: DEGRADED_NODE_ID,
        };

    const response: ResponsePayload = nodeResult
      ? this.fromNode(nodeResult.responsePayload, input, templates, base.confidence)
      : this.fallback(input, templates, base.confidence);

    const body: ResponseBody = {
      ...base,
      ...(culturalMatches.length > 0 ? { culturalContext: this.culturalContext(culturalMatches, input.language) } : {}),
      ...(realWorldData ? { realWorldData } : {}),
      ...(nodeResult
        ? {}
        : { degraded: { reason: input.nodeFailure ?? 'Language node unavailable', note: templates.degradedNote } }),
      response,
    };

    return deepFreeze({
      query: query.rawText,
      detectedLanguage: detection.detectedLanguage,
      processingTimeMs: Math.max(0, Math.round(input.elapsedMs)),
      timestamp: (input.now ?? new Date()).toISOString(),
      response: body,
    });
  }

  private culturalContext(matches: CulturalMatch[], language: Language): CulturalContextView {
    const categories: CulturalCategory[] = [];
    for (const match of matches) {
      if (!categories.includes(match.category)) categories.push(match.category);
    }
    return { primary: localName(matches[0], language), categories, matches };
  }

  private fromNode(
    payload: ResponsePayload,
    input: SynthesisInput,
    templates: ProfileTemplates,
    confidence: number
  ): ResponsePayload {
    const data = input.realWorldData;
    if (payload.kind !== 'cultural_guide' || !data) return payload;

    const primary = input.culturalMatches.find((m) => m.category === 'festival' || m.category === 'tradition');
    const name = primary ? localName(primary, input.language) : payload.title;
    const sections = [`${templates.traditionalLabel}: ${fillTemplate(templates.traditionalKnowledge, { name })}`];
    if (payload.traditionalPractices.length > 0) sections.push(payload.traditionalPractices.join(', '));
    sections.push(...this.liveSections(data, templates));

    return {
      kind: 'enhanced_cultural_response',
      culturalIntroduction: fillTemplate(templates.introCultural, { query: input.query.rawText.trim() }),
      mainContent: sections.join('\n\n'),
      practicalAdvice: templates.adviceRealWorld,
      additionalResources: toResources(data),
      confidenceLevel: confidenceLevel(confidence),
    };
  }

  private fallback(input: SynthesisInput, templates: ProfileTemplates, confidence: number): ResponsePayload {
    const text = input.query.rawText.trim();
    const data = input.realWorldData;

    if (!data) {
      return {
        kind: 'general_response',
        content: fillTemplate(templates.noInformation, { query: text }),
        suggestion: templates.suggestion,
        relatedTopics: input.culturalMatches.map((m) => localName(m, input.language)),
      };
    }

    return {
      kind: 'real_world_response',
      culturalIntroduction: fillTemplate(
        input.culturalMatches.length > 0 ? templates.introCultural : templates.introGeneral,
        { query: text }
      ),
      mainContent: this.liveSections(data, templates).join('\n\n'),
      practicalAdvice: `${templates.adviceRealWorld} ${templates.adviceSafety}`,
      additionalResources: toResources(data),
      confidenceLevel: confidenceLevel(confidence),
    };
  }

  private liveSections(data: RealWorldData, templates: ProfileTemplates): string[] {
    const sections: string[] = [];
    const current = data.aiSummary?.summaryText || data.searchResults[0]?.snippet;
    if (current) sections.push(`${templates.currentLabel}: ${current}`);
    const sources = [...new Set(data.searchResults.map((doc) => doc.source))];
    sections.push(`${templates.sourcesLabel}: ${sources.join(', ')}`);
    return sections;
  }
}
