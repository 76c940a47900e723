import type {
  CulturalMatch,
  IntentClassification,
  Language,
  LanguageDetectionResult,
  NodeResult,
} from '../types';

export interface NodeRequest {
  text: string;
  language: Language;
  detection: LanguageDetectionResult;
  intent: IntentClassification;
  culturalMatches: CulturalMatch[];
}

/**
 * A per-language processing unit. Implementations must stop work when
 * `signal` aborts; the router enforces the timeout either way.
 */
export interface LanguageNode {
  readonly id: string;
  readonly language: Language;
  readonly kind: 'local' | 'http';
  process(request: NodeRequest, signal: AbortSignal): Promise<NodeResult>;
}
