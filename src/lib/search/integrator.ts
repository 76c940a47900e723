import { LRUCache } from 'lru-cache';
import pLimit, { type LimitFunction } from 'p-limit';
import type { SearchConfig } from '../config';
import { describeError } from '../errors';
import { deepFreeze } from '../freeze';
import { getCacheKey } from '../hash';
import type { Logger } from '../logger';
import type { ProfileCatalog } from '../nodes/profiles';
import { sanitizeSnippet, sourceOf } from '../sanitize';
import { withTimeout } from '../timeout';
import type { Language, RealWorldData, SearchDocument } from '../types';
import type { RawSearchHit, SearchProvider } from './providers';
import { summarizeDocuments, type SummaryMode } from './summarize';

export interface StandaloneSearchOptions {
  limit: number;
  mode: SummaryMode;
  signal?: AbortSignal;
}

export function cleanHits(hits: readonly RawSearchHit[]): SearchDocument[] {
  const seen = new Set<string>();
  const docs: SearchDocument[] = [];
  for (const hit of hits) {
    const link = hit.link.trim();
    if (!link || seen.has(link)) continue;
    const title = sanitizeSnippet(hit.title);
    const snippet = sanitizeSnippet(hit.snippet);
    if (!title && !snippet) continue;
    seen.add(link);
    docs.push({ title, snippet, link, source: sourceOf(link) });
  }
  return docs;
}

/**
 * Corroborates an answer with live search results. Never throws: any
 * provider failure, timeout or empty result yields `undefined`.
 */
export class RealWorldIntegrator {
  private readonly cache: LRUCache<string, RealWorldData>;
  private readonly limit: LimitFunction;

  constructor(
    private readonly provider: SearchProvider,
    private readonly profiles: ProfileCatalog,
    private readonly config: SearchConfig,
    private readonly logger: Logger
  ) {
    this.cache = new LRUCache<string, RealWorldData>({
      max: config.cacheMax,
      ttl: config.cacheTtlMs,
      updateAgeOnGet: true,
    });
    this.limit = pLimit(config.concurrency);
  }

  get providerName(): string {
    return this.provider.name;
  }

  get enabled(): boolean {
    return this.provider.enabled;
  }

  get cacheSize(): number {
    return this.cache.size;
  }

  async enrich(rawText: string, language: Language, signal?: AbortSignal): Promise<RealWorldData | undefined> {
    if (!this.provider.enabled) return undefined;

    const cacheKey = getCacheKey(rawText, language);
    const cached = this.cache.get(cacheKey);
    if (cached) {
      this.logger.debug({ cacheKey }, 'Search cache hit');
      return cached;
    }
    this.logger.debug({ cacheKey }, 'Search cache miss');

    const data = await this.fetch(rawText, language, {
      limit: this.config.maxResults,
      topN: this.config.summaryTopN,
      mode: 'auto',
      signal,
    });
    if (data) this.cache.set(cacheKey, data);
    return data;
  }

  /**
   * One uncached search with the caller's result count and summary mode.
   * Every returned document is summarized.
   */
  async search(rawText: string, language: Language, options: StandaloneSearchOptions): Promise<RealWorldData | undefined> {
    if (!this.provider.enabled) return undefined;
    return this.fetch(rawText, language, { ...options, topN: options.limit });
  }

  private async fetch(
    rawText: string,
    language: Language,
    { limit, topN, mode, signal }: StandaloneSearchOptions & { topN: number }
  ): Promise<RealWorldData | undefined> {
    try {
      // The timeout covers time spent waiting for a free slot as well.
      const hits = await withTimeout(
        (searchSignal) => this.limit(() => this.provider.search(rawText, language, { signal: searchSignal, limit })),
        this.config.timeoutMs,
        `search:${this.provider.name}`,
        signal
      );

      const docs = cleanHits(hits);
      if (docs.length === 0) {
        this.logger.warn(
          { code: 'SearchProviderFailure', provider: this.provider.name, language },
          'Search returned no usable results'
        );
        return undefined;
      }

      const aiSummary = summarizeDocuments(rawText, docs, this.profiles[language], topN, mode);
      return deepFreeze(aiSummary ? { searchResults: docs, aiSummary } : { searchResults: docs });
    } catch (error) {
      this.logger.warn(
        { code: 'SearchProviderFailure', provider: this.provider.name, language, err: describeError(error) },
        'Search enrichment failed'
      );
      return undefined;
    }
  }
}
