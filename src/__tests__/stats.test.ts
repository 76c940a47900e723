import { describe, it, expect, vi, beforeEach } from 'vitest';
import { MemoryStatsStore, MongoStatsStore, statFromEnvelope, type QueryStat } from '../lib/stats';
import type { ResponseEnvelope } from '../lib/types';
import { analyse } from './__mocks__/fixtures';

const mocks = vi.hoisted(() => ({ aggregate: vi.fn(), create: vi.fn() }));

// Mock the mongoose model (default export)
vi.mock('../models/QueryRecord', () => ({
  default: { aggregate: mocks.aggregate, create: mocks.create },
}));

const stat = (overrides: Partial<QueryStat>): QueryStat => ({
  language: 'hindi',
  nodeId: 'hindi_node',
  intent: 'cultural_guide',
  confidence: 0.9,
  latencyMs: 10,
  cultural: true,
  degraded: false,
  enriched: false,
  ...overrides,
});

describe('statFromEnvelope', () => {
  it('flattens an envelope into a stat row', () => {
    const { detection } = analyse('How to start a business');
    const envelope: ResponseEnvelope = {
      query: 'How to start a business',
      detectedLanguage: 'english',
      processingTimeMs: 7,
      timestamp: '2024-11-01T10:00:00.000Z',
      response: {
        intent: 'general_response',
        confidence: 0.3,
        script: detection,
        nodeId: 'degraded_fallback',
        degraded: { reason: 'down', note: 'note' },
        response: { kind: 'general_response', content: 'c', suggestion: 's', relatedTopics: [] },
      },
    };

    expect(statFromEnvelope(envelope)).toEqual({
      language: 'english',
      nodeId: 'degraded_fallback',
      intent: 'general_response',
      confidence: 0.3,
      latencyMs: 7,
      cultural: false,
      degraded: true,
      enriched: false,
    });
  });
});

describe('MemoryStatsStore', () => {
  it('starts empty', async () => {
    await expect(new MemoryStatsStore().snapshot()).resolves.toEqual({
      totalQueries: 0,
      averageAccuracy: 0,
      averageLatencyMs: 0,
      culturalRelevance: 0,
      degradedQueries: 0,
      enrichedQueries: 0,
      byLanguage: { hindi: 0, telugu: 0, marathi: 0, english: 0 },
    });
  });

  it('aggregates recorded queries', async () => {
    const store = new MemoryStatsStore();
    await store.record(stat({}));
    await store.record(stat({ confidence: 0.3, latencyMs: 20, cultural: false, degraded: true }));
    await store.record(stat({ language: 'english', latencyMs: 18, enriched: true }));
    await store.record(stat({ language: 'telugu', confidence: 0.7, latencyMs: 16, cultural: false, enriched: true }));

    await expect(store.snapshot()).resolves.toEqual({
      totalQueries: 4,
      averageAccuracy: 0.7,
      averageLatencyMs: 16,
      culturalRelevance: 0.5,
      degradedQueries: 1,
      enrichedQueries: 2,
      byLanguage: { hindi: 2, telugu: 1, marathi: 0, english: 1 },
    });
  });
});

describe('MongoStatsStore', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('writes one record per query', async () => {
    const row = stat({});
    await new MongoStatsStore().record(row);
    expect(mocks.create).toHaveBeenCalledWith(row);
  });

  it('builds the snapshot from aggregations', async () => {
    mocks.aggregate
      .mockResolvedValueOnce([
        { _id: null, total: 4, confidence: 0.8125, latency: 12.4, cultural: 3, degraded: 1, enriched: 2 },
      ])
      .mockResolvedValueOnce([
        { _id: 'hindi', count: 3 },
        { _id: 'tamil', count: 1 },
      ]);

    await expect(new MongoStatsStore().snapshot()).resolves.toEqual({
      totalQueries: 4,
      averageAccuracy: 0.81,
      averageLatencyMs: 12,
      culturalRelevance: 0.75,
      degradedQueries: 1,
      enrichedQueries: 2,
      byLanguage: { hindi: 3, telugu: 0, marathi: 0, english: 0 },
    });
    expect(mocks.aggregate).toHaveBeenCalledTimes(2);
  });

  it('reports zeros for an empty collection', async () => {
    mocks.aggregate.mockResolvedValue([]);
    await expect(new MongoStatsStore().snapshot()).resolves.toMatchObject({
      totalQueries: 0,
      averageAccuracy: 0,
      byLanguage: { hindi: 0, telugu: 0, marathi: 0, english: 0 },
    });
  });
});
