import type { KnowledgeBase } from '../culture';
import type { NodesConfig } from '../config';
import { NodeUnavailableError, UnsupportedLanguageError } from '../errors';
import type { Logger } from '../logger';
import { round2 } from '../text';
import { withTimeout } from '../timeout';
import {
  LANGUAGES,
  type CulturalMatch,
  type IntentClassification,
  type Language,
  type LanguageDetectionResult,
  type NodeResult,
  type Query,
} from '../types';
import { HttpLanguageNode } from './http';
import { LocalLanguageNode } from './local';
import type { LanguageNode } from './node';
import type { ProfileCatalog } from './profiles';

export interface NodeMetrics {
  totalQueries: number;
  successfulQueries: number;
  /** Share of dispatches that answered in time; 0 before the first one. */
  successRate: number;
  /** Mean over every dispatch, failed ones included. */
  averageResponseTimeMs: number;
}

export interface NodeStatus {
  nodeId: string;
  language: Language;
  kind: LanguageNode['kind'];
  metrics: NodeMetrics;
}

interface MetricsTally {
  total: number;
  successful: number;
  totalMs: number;
}

/**
 * Chooses the language node for a query and runs it under the per-node
 * timeout. The registry is fixed at construction.
 */
export class NodeRouter {
  private readonly registry: ReadonlyMap<Language, LanguageNode>;
  // Counters only; they never influence routing.
  private readonly tallies = new Map<string, MetricsTally>();

  constructor(
    nodes: Iterable<LanguageNode>,
    private readonly timeoutMs: number,
    private readonly logger: Logger
  ) {
    const registry = new Map<Language, LanguageNode>();
    for (const node of nodes) {
      if (registry.has(node.language)) throw new Error(`Duplicate node for language ${node.language}`);
      registry.set(node.language, node);
    }
    this.registry = registry;
  }

  supportedLanguages(): Language[] {
    return LANGUAGES.filter((language) => this.registry.has(language));
  }

  status(): NodeStatus[] {
    return this.supportedLanguages().flatMap((language) => {
      const node = this.registry.get(language);
      return node ? [{ nodeId: node.id, language, kind: node.kind, metrics: this.metrics(node.id) }] : [];
    });
  }

  metrics(nodeId: string): NodeMetrics {
    const tally = this.tallies.get(nodeId);
    if (!tally || tally.total === 0) {
      return { totalQueries: 0, successfulQueries: 0, successRate: 0, averageResponseTimeMs: 0 };
    }
    return {
      totalQueries: tally.total,
      successfulQueries: tally.successful,
      successRate: round2(tally.successful / tally.total),
      averageResponseTimeMs: round2(tally.totalMs / tally.total),
    };
  }

  private record(nodeId: string, success: boolean, ms: number): void {
    const tally = this.tallies.get(nodeId) ?? { total: 0, successful: 0, totalMs: 0 };
    tally.total += 1;
    if (success) tally.successful += 1;
    tally.totalMs += ms;
    this.tallies.set(nodeId, tally);
  }

  /**
   * An explicitly requested language wins over detection. When neither the
   * requested nor the detected language has a node the query is rejected.
   */
  resolve(query: Query, detection: LanguageDetectionResult): LanguageNode {
    const requested = query.requestedLanguage ? this.registry.get(query.requestedLanguage) : undefined;
    if (requested) return requested;

    const detected = this.registry.get(detection.detectedLanguage);
    if (detected) {
      if (query.requestedLanguage) {
        this.logger.debug(
          { requested: query.requestedLanguage, detected: detection.detectedLanguage },
          'Requested language has no node, using detected language'
        );
      }
      return detected;
    }

    throw new UnsupportedLanguageError(query.requestedLanguage ?? detection.detectedLanguage, this.supportedLanguages());
  }

  async route(
    query: Query,
    detection: LanguageDetectionResult,
    intent: IntentClassification,
    culturalMatches: CulturalMatch[],
    signal?: AbortSignal
  ): Promise<NodeResult> {
    const node = this.resolve(query, detection);
    return this.dispatch(node, query, detection, intent, culturalMatches, signal);
  }

  async dispatch(
    node: LanguageNode,
    query: Query,
    detection: LanguageDetectionResult,
    intent: IntentClassification,
    culturalMatches: CulturalMatch[],
    signal?: AbortSignal
  ): Promise<NodeResult> {
    const request = { text: query.rawText, language: node.language, detection, intent, culturalMatches };
    const started = Date.now();
    try {
      const result = await withTimeout((nodeSignal) => node.process(request, nodeSignal), this.timeoutMs, node.id, signal);
      const ms = Date.now() - started;
      this.record(node.id, true, ms);
      this.logger.debug({ nodeId: node.id, ms }, 'Language node answered');
      return result;
    } catch (error) {
      const ms = Date.now() - started;
      this.record(node.id, false, ms);
      const unavailable = new NodeUnavailableError(node.id, error);
      this.logger.warn({ nodeId: node.id, ms, err: unavailable.message }, 'Language node unavailable');
      throw unavailable;
    }
  }
}

/**
 * One node per language: remote where `NODE_ENDPOINTS` names an endpoint,
 * in-process otherwise.
 */
export function buildNodes(
  config: NodesConfig,
  kb: KnowledgeBase,
  profiles: ProfileCatalog,
  logger: Logger
): LanguageNode[] {
  return LANGUAGES.map((language) => {
    const profile = profiles[language];
    const endpoint = config.endpoints[language];
    return endpoint
      ? new HttpLanguageNode(profile.nodeId, language, endpoint, config.timeoutMs, logger)
      : new LocalLanguageNode(language, profile, kb);
  });
}
