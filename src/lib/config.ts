import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { LANGUAGES, isLanguage, type Language } from './types';

export type SearchProviderName = 'google_cse' | 'serper' | 'none';

export interface SearchConfig {
  provider: SearchProviderName;
  apiKey?: string;
  engineId?: string;
  baseUrl?: string;
  timeoutMs: number;
  maxResults: number;
  summaryTopN: number;
  concurrency: number;
  cacheTtlMs: number;
  cacheMax: number;
}

export interface NodesConfig {
  timeoutMs: number;
  endpoints: Partial<Record<Language, string>>;
}

export interface AppConfig {
  port: number;
  host: string;
  logLevel: string;
  mongodbUri?: string;
  requestDeadlineMs: number;
  search: SearchConfig;
  nodes: NodesConfig;
  paths: {
    knowledgeBase: string;
    nodeProfiles: string;
    languages: string;
  };
}

const dataFile = (name: string) => fileURLToPath(new URL(`../../data/${name}`, import.meta.url));

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const envSchema = z
  .object({
    PORT: positiveInt(3000),
    HOST: z.string().default('0.0.0.0'),
    LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
    MONGODB_URI: z.string().optional(),
    SEARCH_PROVIDER: z.enum(['google_cse', 'serper', 'none']).default('google_cse'),
    GOOGLE_CSE_API_KEY: z.string().optional(),
    GOOGLE_CSE_ID: z.string().optional(),
    SERPER_API_KEY: z.string().optional(),
    SEARCH_BASE_URL: z.string().url().optional(),
    SEARCH_TIMEOUT_MS: positiveInt(4000),
    SEARCH_MAX_RESULTS: z.coerce.number().int().min(1).max(10).default(5),
    SEARCH_SUMMARY_TOP_N: z.coerce.number().int().min(1).max(10).default(3),
    SEARCH_CONCURRENCY: positiveInt(4),
    SEARCH_CACHE_TTL_MS: positiveInt(60 * 60 * 1000),
    SEARCH_CACHE_MAX: positiveInt(500),
    NODE_TIMEOUT_MS: positiveInt(3000),
    NODE_ENDPOINTS: z.string().optional(),
    REQUEST_DEADLINE_MS: positiveInt(8000),
    KNOWLEDGE_BASE_PATH: z.string().default(dataFile('cultural-kb.json')),
    NODE_PROFILES_PATH: z.string().default(dataFile('node-profiles.json')),
    LANGUAGES_PATH: z.string().default(dataFile('languages.json')),
  })
  .superRefine((env, ctx) => {
    if (env.SEARCH_TIMEOUT_MS >= env.REQUEST_DEADLINE_MS) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['SEARCH_TIMEOUT_MS'],
        message: 'SEARCH_TIMEOUT_MS must be shorter than REQUEST_DEADLINE_MS',
      });
    }
  });

/**
 * Parses `NODE_ENDPOINTS`, e.g. `telugu=http://localhost:8002,marathi=http://localhost:8003`.
 */
export function parseNodeEndpoints(raw: string | undefined): Partial<Record<Language, string>> {
  const endpoints: Partial<Record<Language, string>> = {};
  if (!raw) return endpoints;
  for (const pair of raw.split(',')) {
    const [name, url] = pair.split('=').map((part) => part.trim());
    if (!name || !url) continue;
    if (!isLanguage(name)) {
      throw new Error(`NODE_ENDPOINTS: unknown language '${name}' (expected one of ${LANGUAGES.join(', ')})`);
    }
    endpoints[name] = url.replace(/\/$/, '');
  }
  return endpoints;
}

function withoutBlanks(env: NodeJS.ProcessEnv): Record<string, string> {
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') cleaned[key] = value.trim();
  }
  return cleaned;
}

/**
 * Builds the process-wide configuration once at startup. The result is frozen
 * and passed into every component; nothing reads the environment afterwards.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.parse(withoutBlanks(env));

  const search: SearchConfig = Object.freeze({
    provider: parsed.SEARCH_PROVIDER,
    apiKey: parsed.SEARCH_PROVIDER === 'serper' ? parsed.SERPER_API_KEY : parsed.GOOGLE_CSE_API_KEY,
    engineId: parsed.GOOGLE_CSE_ID,
    baseUrl: parsed.SEARCH_BASE_URL,
    timeoutMs: parsed.SEARCH_TIMEOUT_MS,
    maxResults: parsed.SEARCH_MAX_RESULTS,
    summaryTopN: parsed.SEARCH_SUMMARY_TOP_N,
    concurrency: parsed.SEARCH_CONCURRENCY,
    cacheTtlMs: parsed.SEARCH_CACHE_TTL_MS,
    cacheMax: parsed.SEARCH_CACHE_MAX,
  });

  return Object.freeze({
    port: parsed.PORT,
    host: parsed.HOST,
    logLevel: parsed.LOG_LEVEL,
    mongodbUri: parsed.MONGODB_URI,
    requestDeadlineMs: parsed.REQUEST_DEADLINE_MS,
    search,
    nodes: Object.freeze({
      timeoutMs: parsed.NODE_TIMEOUT_MS,
      endpoints: Object.freeze(parseNodeEndpoints(parsed.NODE_ENDPOINTS)),
    }),
    paths: Object.freeze({
      knowledgeBase: parsed.KNOWLEDGE_BASE_PATH,
      nodeProfiles: parsed.NODE_PROFILES_PATH,
      languages: parsed.LANGUAGES_PATH,
    }),
  });
}
