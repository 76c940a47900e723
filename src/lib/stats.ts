import QueryRecord, { type QueryRecordFields } from '../models/QueryRecord';
import { round2 } from './text';
import { LANGUAGES, type Language, type ResponseEnvelope } from './types';

export type QueryStat = QueryRecordFields;

export interface StatsSnapshot {
  totalQueries: number;
  /** Mean response confidence. */
  averageAccuracy: number;
  averageLatencyMs: number;
  /** Share of queries that carried cultural context. */
  culturalRelevance: number;
  degradedQueries: number;
  enrichedQueries: number;
  byLanguage: Record<Language, number>;
}

export interface StatsStore {
  readonly kind: 'memory' | 'mongo';
  record(stat: QueryStat): Promise<void>;
  snapshot(): Promise<StatsSnapshot>;
}

export function statFromEnvelope(envelope: ResponseEnvelope): QueryStat {
  const { response } = envelope;
  return {
    language: envelope.detectedLanguage,
    nodeId: response.nodeId,
    intent: response.intent,
    confidence: response.confidence,
    latencyMs: envelope.processingTimeMs,
    cultural: response.culturalContext !== undefined,
    degraded: response.degraded !== undefined,
    enriched: response.realWorldData !== undefined,
  };
}

function emptyByLanguage(): Record<Language, number> {
  return { hindi: 0, telugu: 0, marathi: 0, english: 0 };
}

export class MemoryStatsStore implements StatsStore {
  readonly kind = 'memory' as const;
  private total = 0;
  private confidenceSum = 0;
  private latencySum = 0;
  private cultural = 0;
  private degraded = 0;
  private enriched = 0;
  private readonly byLanguage = emptyByLanguage();

  async record(stat: QueryStat): Promise<void> {
    this.total += 1;
    this.confidenceSum += stat.confidence;
    this.latencySum += stat.latencyMs;
    if (stat.cultural) this.cultural += 1;
    if (stat.degraded) this.degraded += 1;
    if (stat.enriched) this.enriched += 1;
    this.byLanguage[stat.language] += 1;
  }

  async snapshot(): Promise<StatsSnapshot> {
    const n = this.total;
    return {
      totalQueries: n,
      averageAccuracy: n ? round2(this.confidenceSum / n) : 0,
      averageLatencyMs: n ? Math.round(this.latencySum / n) : 0,
      culturalRelevance: n ? round2(this.cultural / n) : 0,
      degradedQueries: this.degraded,
      enrichedQueries: this.enriched,
      byLanguage: { ...this.byLanguage },
    };
  }
}

interface Totals {
  total: number;
  confidence: number;
  latency: number;
  cultural: number;
  degraded: number;
  enriched: number;
}

interface LanguageCount {
  _id: string;
  count: number;
}

const countIf = (field: string) => ({ $sum: { $cond: [`$${field}`, 1, 0] } });

/**
 * Counters kept in MongoDB so they survive restarts and are shared between
 * instances.
 */
export class MongoStatsStore implements StatsStore {
  readonly kind = 'mongo' as const;

  async record(stat: QueryStat): Promise<void> {
    await QueryRecord.create(stat);
  }

  async snapshot(): Promise<StatsSnapshot> {
    const [totals] = await QueryRecord.aggregate<Totals>([
      {
        $group: {
          _id: null,
          total: { $sum: 1 },
          confidence: { $avg: '$confidence' },
          latency: { $avg: '$latencyMs' },
          cultural: countIf('cultural'),
          degraded: countIf('degraded'),
          enriched: countIf('enriched'),
        },
      },
    ]);
    const languages = await QueryRecord.aggregate<LanguageCount>([{ $group: { _id: '$language', count: { $sum: 1 } } }]);

    const byLanguage = emptyByLanguage();
    for (const { _id, count } of languages) {
      const language = LANGUAGES.find((l) => l === _id);
      if (language) byLanguage[language] = count;
    }

    if (!totals || totals.total === 0) {
      return {
        totalQueries: 0,
        averageAccuracy: 0,
        averageLatencyMs: 0,
        culturalRelevance: 0,
        degradedQueries: 0,
        enrichedQueries: 0,
        byLanguage,
      };
    }
    return {
      totalQueries: totals.total,
      averageAccuracy: round2(totals.confidence),
      averageLatencyMs: Math.round(totals.latency),
      culturalRelevance: round2(totals.cultural / totals.total),
      degradedQueries: totals.degraded,
      enrichedQueries: totals.enriched,
      byLanguage,
    };
  }
}
