import type { KnowledgeBase, KnowledgeEntry } from '../culture';
import { fillTemplate } from '../template';
import { round2 } from '../text';
import { AbortedError } from '../timeout';
import type { CulturalMatch, Language, NodeResult, ResponsePayload } from '../types';
import type { LanguageNode, NodeRequest } from './node';
import type { LanguageProfile } from './profiles';
import { rankBySimilarity, trigramVector, type TermVector } from './similarity';

const RELATED_MIN_SCORE = 0.15;
const RELATED_LIMIT = 3;

/**
 * In-process language node: transliterates romanized words, proposes related
 * topics by trigram similarity and fills the per-intent payload from the
 * language profile.
 */
export class LocalLanguageNode implements LanguageNode {
  readonly id: string;
  readonly kind = 'local' as const;
  private readonly entryVectors: ReadonlyArray<{ item: KnowledgeEntry; vector: TermVector }>;

  constructor(
    readonly language: Language,
    private readonly profile: LanguageProfile,
    private readonly kb: KnowledgeBase
  ) {
    this.id = profile.nodeId;
    this.entryVectors = kb.all().map((entry) => ({
      item: entry,
      vector: trigramVector(Object.values(entry.names).flat().join(' ')),
    }));
  }

  async process(request: NodeRequest, signal: AbortSignal): Promise<NodeResult> {
    if (signal.aborted) throw new AbortedError(this.id);

    return {
      nodeId: this.id,
      language: this.language,
      intent: request.intent.label,
      responsePayload: this.buildPayload(request),
      scriptInfo: request.detection,
      confidence: this.confidence(request),
    };
  }

  /**
   * Replaces known romanized words ("diwali") with their native spelling.
   */
  transliterate(text: string): string {
    const table = this.profile.transliterations;
    return text.replace(/[A-Za-z]+/g, (word) => {
      const key = word.toLowerCase();
      return Object.hasOwn(table, key) ? table[key] : word;
    });
  }

  relatedTopics(text: string, exclude: ReadonlySet<string>): string[] {
    const query = trigramVector(this.transliterate(text));
    const candidates = this.entryVectors.filter(({ item }) => !exclude.has(item.id));
    return rankBySimilarity(query, candidates, RELATED_MIN_SCORE, RELATED_LIMIT).map(({ item }) =>
      this.kb.localizedName(item, this.language)
    );
  }

  private confidence(request: NodeRequest): number {
    let confidence = 0.6;
    if (request.culturalMatches.length > 0) confidence += 0.2;
    if (request.detection.detectedLanguage === this.language) confidence += 0.1;
    return round2(Math.min(confidence, 1));
  }

  private nameOf(match: CulturalMatch): string {
    return match.localizedNames[this.language] ?? match.canonicalName;
  }

  // Matches carry practices in the detected language; re-localize for this node.
  private practicesOf(match: CulturalMatch): string[] {
    const entry = this.kb.get(match.id);
    return [...(entry?.practices[this.language] ?? match.practices)];
  }

  private buildPayload(request: NodeRequest): ResponsePayload {
    const { templates } = this.profile;
    const matches = request.culturalMatches;

    switch (request.intent.label) {
      case 'cultural_guide': {
        const primary = matches.find((m) => m.category === 'festival' || m.category === 'tradition');
        if (!primary) break;
        const name = this.nameOf(primary);
        return {
          kind: 'cultural_guide',
          title: fillTemplate(templates.guideTitle, { name }),
          content: fillTemplate(templates.guideContent, {
            name,
            timing: primary.metadata.timing ?? primary.metadata.significance ?? primary.canonicalName,
          }),
          culturalSignificance: primary.metadata.significance ?? '',
          traditionalPractices: this.practicesOf(primary),
        };
      }
      case 'healthcare_advice': {
        const primary = matches.find((m) => m.category === 'health');
        return {
          kind: 'healthcare_advice',
          condition: primary ? this.nameOf(primary) : request.text.trim(),
          traditionalRemedies: primary ? this.practicesOf(primary) : [],
          ayurvedicApproach: templates.ayurvedicApproach,
          disclaimer: templates.disclaimer,
        };
      }
      case 'general_response':
        break;
    }

    return {
      kind: 'general_response',
      content: fillTemplate(templates.generalContent, { query: request.text.trim() }),
      suggestion: templates.suggestion,
      relatedTopics: this.relatedTopics(request.text, new Set(matches.map((m) => m.id))),
    };
  }
}
