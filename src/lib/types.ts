// Shared domain types for the query pipeline.

export const LANGUAGES = ['hindi', 'telugu', 'marathi', 'english'] as const;
export type Language = (typeof LANGUAGES)[number];

export type Script = 'devanagari' | 'telugu' | 'latin' | 'unknown';

export function isLanguage(value: string): value is Language {
  return (LANGUAGES as readonly string[]).includes(value);
}

export interface Query {
  readonly rawText: string;
  readonly requestedLanguage?: Language;
  readonly receivedAt: Date;
}

export type ScriptRatios = Record<Exclude<Script, 'unknown'>, number>;

export interface LanguageDetectionResult {
  detectedLanguage: Language;
  primaryScript: Script;
  confidence: number;
  scriptRatios: ScriptRatios;
}

export const CULTURAL_CATEGORIES = ['festival', 'food', 'tradition', 'policy', 'health'] as const;
export type CulturalCategory = (typeof CULTURAL_CATEGORIES)[number];

export interface CulturalMatch {
  id: string;
  category: CulturalCategory;
  canonicalName: string;
  localizedNames: Partial<Record<Language, string>>;
  metadata: Record<string, string>;
  practices: string[];
  matchedPhrase: string;
  confidence: number;
}

export const INTENT_LABELS = ['cultural_guide', 'healthcare_advice', 'general_response'] as const;
export type IntentLabel = (typeof INTENT_LABELS)[number];

export interface IntentClassification {
  label: IntentLabel;
  confidence: number;
  signals: string[];
}

export interface ResourceLink {
  title: string;
  link: string;
  source: string;
  snippet: string;
}

export type ConfidenceLevel = 'high' | 'medium' | 'low';

export interface CulturalGuidePayload {
  kind: 'cultural_guide';
  title: string;
  content: string;
  culturalSignificance: string;
  traditionalPractices: string[];
}

export interface HealthcareAdvicePayload {
  kind: 'healthcare_advice';
  condition: string;
  traditionalRemedies: string[];
  ayurvedicApproach: string;
  disclaimer: string;
}

export interface GeneralResponsePayload {
  kind: 'general_response';
  content: string;
  suggestion: string;
  relatedTopics: string[];
}

export interface EnhancedCulturalPayload {
  kind: 'enhanced_cultural_response';
  culturalIntroduction: string;
  mainContent: string;
  practicalAdvice: string;
  additionalResources: ResourceLink[];
  confidenceLevel: ConfidenceLevel;
}

export interface RealWorldResponsePayload {
  kind: 'real_world_response';
  culturalIntroduction: string;
  mainContent: string;
  practicalAdvice: string;
  additionalResources: ResourceLink[];
  confidenceLevel: ConfidenceLevel;
}

export type ResponsePayload =
  | CulturalGuidePayload
  | HealthcareAdvicePayload
  | GeneralResponsePayload
  | EnhancedCulturalPayload
  | RealWorldResponsePayload;

export interface NodeResult {
  nodeId: string;
  language: Language;
  intent: IntentLabel;
  responsePayload: ResponsePayload;
  scriptInfo: LanguageDetectionResult;
  confidence: number;
}

export interface SearchDocument {
  title: string;
  snippet: string;
  link: string;
  source: string;
}

export type SummaryMethod = 'extractive' | 'abstractive';

export interface AiSummary {
  summaryText: string;
  keyInsights: string[];
  confidenceScore: number;
  method: SummaryMethod;
  sourceCount: number;
}

export interface RealWorldData {
  searchResults: SearchDocument[];
  aiSummary?: AiSummary;
}

export interface CulturalContextView {
  primary: string;
  categories: CulturalCategory[];
  matches: CulturalMatch[];
}

export interface DegradedInfo {
  reason: string;
  note: string;
}

export interface ResponseBody {
  intent: IntentLabel;
  confidence: number;
  script: LanguageDetectionResult;
  nodeId: string;
  culturalContext?: CulturalContextView;
  realWorldData?: RealWorldData;
  degraded?: DegradedInfo;
  response: ResponsePayload;
}

export interface ResponseEnvelope {
  query: string;
  detectedLanguage: Language;
  processingTimeMs: number;
  timestamp: string;
  response: ResponseBody;
}
