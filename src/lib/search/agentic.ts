import { detectLanguage } from '../detect';
import { SearchProviderError } from '../errors';
import { createQuery } from '../pipeline';
import type { AgenticSearchRequest, SearchApproach } from '../schemas';
import type { Language, SearchDocument, SummaryMethod } from '../types';
import type { RealWorldIntegrator } from './integrator';
import type { SummaryMode } from './summarize';

const APPROACH_MODES: Record<SearchApproach, SummaryMode> = {
  lightweight: 'extractive',
  agentic: 'abstractive',
  hybrid: 'auto',
};

export interface AgenticSearchResult {
  query: string;
  language: Language;
  approachRequested: SearchApproach;
  approachUsed: SummaryMethod;
  executionTimeMs: number;
  aiSummary: string;
  keyInsights: string[];
  confidenceScore: number;
  searchResults: SearchDocument[];
  sourceCount: number;
  timestamp: string;
}

/**
 * Search and summarize without the cultural pipeline. `agentic` forces the
 * abstractive summary, which still falls back to extractive when the results
 * share no topics.
 */
export async function runAgenticSearch(
  integrator: RealWorldIntegrator,
  request: AgenticSearchRequest,
  now = new Date()
): Promise<AgenticSearchResult> {
  const query = createQuery(request.text, request.language, undefined, now);
  const language = query.requestedLanguage ?? detectLanguage(query.rawText).detectedLanguage;
  const started = performance.now();

  const data = await integrator.search(query.rawText, language, {
    limit: request.maxResults,
    mode: APPROACH_MODES[request.approach],
  });
  if (!data?.aiSummary) {
    throw new SearchProviderError(integrator.providerName, 'No search results available');
  }

  return {
    query: query.rawText,
    language,
    approachRequested: request.approach,
    approachUsed: data.aiSummary.method,
    executionTimeMs: Math.round(performance.now() - started),
    aiSummary: data.aiSummary.summaryText,
    keyInsights: data.aiSummary.keyInsights,
    confidenceScore: data.aiSummary.confidenceScore,
    searchResults: data.searchResults,
    sourceCount: data.aiSummary.sourceCount,
    timestamp: now.toISOString(),
  };
}
