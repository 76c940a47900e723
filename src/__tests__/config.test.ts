import { describe, it, expect } from 'vitest';
import { loadConfig, parseNodeEndpoints } from '../lib/config';

describe('loadConfig', () => {
  it('fills in defaults', () => {
    const config = loadConfig({});

    expect(config).toMatchObject({
      port: 3000,
      host: '0.0.0.0',
      logLevel: 'info',
      requestDeadlineMs: 8000,
      search: {
        provider: 'google_cse',
        timeoutMs: 4000,
        maxResults: 5,
        summaryTopN: 3,
        concurrency: 4,
        cacheTtlMs: 3_600_000,
        cacheMax: 500,
      },
      nodes: { timeoutMs: 3000, endpoints: {} },
    });
    expect(config.mongodbUri).toBeUndefined();
    expect(config.paths.knowledgeBase.endsWith('data/cultural-kb.json')).toBe(true);
  });

  it('picks the key for the chosen provider', () => {
    const config = loadConfig({
      SEARCH_PROVIDER: 'serper',
      SERPER_API_KEY: 'test-key',
      GOOGLE_CSE_API_KEY: 'other-key',
    });
    expect(config.search.provider).toBe('serper');
    expect(config.search.apiKey).toBe('test-key');
  });

  it('treats blank variables as unset', () => {
    const config = loadConfig({ PORT: '', MONGODB_URI: '   ', SEARCH_MAX_RESULTS: '8' });
    expect(config.port).toBe(3000);
    expect(config.mongodbUri).toBeUndefined();
    expect(config.search.maxResults).toBe(8);
  });

  it('rejects a search timeout that outlasts the request deadline', () => {
    expect(() => loadConfig({ SEARCH_TIMEOUT_MS: '9000' })).toThrow(
      'SEARCH_TIMEOUT_MS must be shorter than REQUEST_DEADLINE_MS'
    );
  });

  it('rejects out-of-range numbers', () => {
    expect(() => loadConfig({ SEARCH_MAX_RESULTS: '50' })).toThrow();
  });

  it('returns a frozen object', () => {
    const config = loadConfig({ NODE_ENDPOINTS: 'telugu=http://localhost:8002' });
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.search)).toBe(true);
    expect(Object.isFrozen(config.nodes.endpoints)).toBe(true);
    expect(config.nodes.endpoints).toEqual({ telugu: 'http://localhost:8002' });
  });
});

describe('parseNodeEndpoints', () => {
  it('parses language=url pairs', () => {
    expect(parseNodeEndpoints('telugu=http://localhost:8002/, marathi = http://localhost:8003')).toEqual({
      telugu: 'http://localhost:8002',
      marathi: 'http://localhost:8003',
    });
  });

  it('returns nothing when unset', () => {
    expect(parseNodeEndpoints(undefined)).toEqual({});
  });

  it('rejects an unknown language', () => {
    expect(() => parseNodeEndpoints('tamil=http://localhost:8005')).toThrow(
      "NODE_ENDPOINTS: unknown language 'tamil' (expected one of hindi, telugu, marathi, english)"
    );
  });
});
