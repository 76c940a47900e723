import axios from 'axios';
import { z } from 'zod';
import type { SearchConfig } from '../config';
import { describeError, SearchProviderError } from '../errors';
import type { Logger } from '../logger';
import type { ProfileCatalog } from '../nodes/profiles';
import type { Language } from '../types';

/** A result as the provider returned it, before cleaning. */
export interface RawSearchHit {
  title: string;
  snippet: string;
  link: string;
}

export interface SearchOptions {
  signal?: AbortSignal;
  limit: number;
}

export interface SearchProvider {
  readonly name: string;
  readonly enabled: boolean;
  search(text: string, language: Language, options: SearchOptions): Promise<RawSearchHit[]>;
}

const GOOGLE_CSE_URL = 'https://www.googleapis.com/customsearch/v1';
const SERPER_URL = 'https://google.serper.dev/search';

const hitSchema = z.object({
  title: z.string().default(''),
  snippet: z.string().nullish(),
  link: z.string().url(),
});

const cseResponseSchema = z.object({ items: z.array(z.unknown()).optional() });
const serperResponseSchema = z.object({ organic: z.array(z.unknown()).optional() });

// Items that fail validation are dropped one by one; the rest are kept.
function toHits(items: unknown[] | undefined): RawSearchHit[] {
  const hits: RawSearchHit[] = [];
  for (const item of items ?? []) {
    const parsed = hitSchema.safeParse(item);
    if (parsed.success) {
      hits.push({ title: parsed.data.title, snippet: parsed.data.snippet ?? '', link: parsed.data.link });
    }
  }
  return hits;
}

function enhanceQuery(text: string, suffix: string): string {
  return suffix ? `${text.trim()} ${suffix}` : text.trim();
}

function toProviderError(provider: string, error: unknown, logger: Logger): SearchProviderError {
  if (error instanceof SearchProviderError) return error;
  if (axios.isAxiosError(error)) {
    logger.warn(
      {
        provider,
        status: error.response?.status,
        statusText: error.response?.statusText,
        code: error.code,
      },
      'Search provider HTTP error'
    );
    return new SearchProviderError(provider, error.message, error.response?.status, error);
  }
  return new SearchProviderError(provider, describeError(error), undefined, error);
}

class GoogleCseProvider implements SearchProvider {
  readonly name = 'google_cse';
  readonly enabled = true;
  private readonly key: string;
  private readonly engineId: string;
  private readonly endpoint: string;

  constructor(
    config: SearchConfig,
    private readonly profiles: ProfileCatalog,
    private readonly logger: Logger
  ) {
    if (!config.apiKey) throw new Error('GOOGLE_CSE_API_KEY is required for the google_cse search provider');
    if (!config.engineId) throw new Error('GOOGLE_CSE_ID is required for the google_cse search provider');
    this.key = config.apiKey;
    this.engineId = config.engineId;
    this.endpoint = config.baseUrl ?? GOOGLE_CSE_URL;
  }

  async search(text: string, language: Language, { signal, limit }: SearchOptions): Promise<RawSearchHit[]> {
    const profile = this.profiles[language];
    try {
      const response = await axios.get<unknown>(this.endpoint, {
        params: {
          q: enhanceQuery(text, profile.searchSuffix),
          key: this.key,
          cx: this.engineId,
          num: limit,
          lr: profile.searchLanguageRestriction,
          gl: 'IN',
          cr: 'countryIN',
        },
        signal,
      });
      const parsed = cseResponseSchema.safeParse(response.data);
      if (!parsed.success) throw new SearchProviderError(this.name, 'Unexpected response shape');
      return toHits(parsed.data.items).slice(0, limit);
    } catch (error) {
      throw toProviderError(this.name, error, this.logger);
    }
  }
}

class SerperProvider implements SearchProvider {
  readonly name = 'serper';
  readonly enabled = true;
  private readonly key: string;
  private readonly endpoint: string;

  constructor(
    config: SearchConfig,
    private readonly profiles: ProfileCatalog,
    private readonly logger: Logger
  ) {
    if (!config.apiKey) throw new Error('SERPER_API_KEY is required for the serper search provider');
    this.key = config.apiKey;
    this.endpoint = config.baseUrl ?? SERPER_URL;
  }

  async search(text: string, language: Language, { signal, limit }: SearchOptions): Promise<RawSearchHit[]> {
    const profile = this.profiles[language];
    try {
      const response = await axios.post<unknown>(
        this.endpoint,
        { q: enhanceQuery(text, profile.searchSuffix), num: limit, gl: 'in', hl: profile.languageCode },
        {
          headers: { 'X-API-KEY': this.key, 'Content-Type': 'application/json' },
          signal,
        }
      );
      const parsed = serperResponseSchema.safeParse(response.data);
      if (!parsed.success) throw new SearchProviderError(this.name, 'Unexpected response shape');
      return toHits(parsed.data.organic).slice(0, limit);
    } catch (error) {
      throw toProviderError(this.name, error, this.logger);
    }
  }
}

class DisabledSearchProvider implements SearchProvider {
  readonly name = 'none';
  readonly enabled = false;

  async search(): Promise<RawSearchHit[]> {
    return [];
  }
}

function missingCredential(config: SearchConfig): string | undefined {
  switch (config.provider) {
    case 'google_cse':
      if (!config.apiKey) return 'GOOGLE_CSE_API_KEY';
      return config.engineId ? undefined : 'GOOGLE_CSE_ID';
    case 'serper':
      return config.apiKey ? undefined : 'SERPER_API_KEY';
    case 'none':
      return undefined;
  }
}

/**
 * A provider without its credentials turns enrichment off instead of
 * stopping the service.
 */
export function makeSearchProvider(config: SearchConfig, profiles: ProfileCatalog, logger: Logger): SearchProvider {
  const missing = missingCredential(config);
  if (missing) {
    logger.warn(
      { code: 'SearchProviderFailure', provider: config.provider, missing },
      `${missing} is not set, search enrichment disabled`
    );
    return new DisabledSearchProvider();
  }

  switch (config.provider) {
    case 'google_cse':
      return new GoogleCseProvider(config, profiles, logger);
    case 'serper':
      return new SerperProvider(config, profiles, logger);
    case 'none':
      return new DisabledSearchProvider();
  }
}

// Exported for tests
export const __testing__ = {
  GoogleCseProvider,
  SerperProvider,
  DisabledSearchProvider,
  enhanceQuery,
  GOOGLE_CSE_URL,
  SERPER_URL,
};
