import { classifyIntent } from './intent';
import type { KnowledgeBase } from './culture';
import { detectLanguage } from './detect';
import { describeError, InvalidQueryError, UnsupportedLanguageError } from './errors';
import type { Logger } from './logger';
import type { NodeRouter } from './nodes/router';
import type { RealWorldIntegrator } from './search/integrator';
import type { ResponseSynthesizer } from './synthesize';
import { isLanguage, LANGUAGES, type Language, type NodeResult, type Query, type ResponseEnvelope } from './types';

export interface QueryInput {
  text: string;
  language?: string;
}

export function createQuery(
  text: string,
  language?: string,
  supportedLanguages: readonly Language[] = LANGUAGES,
  receivedAt = new Date()
): Query {
  if (!text.trim()) throw new InvalidQueryError();
  if (language !== undefined && !isLanguage(language)) {
    throw new UnsupportedLanguageError(language, [...supportedLanguages]);
  }
  return Object.freeze({
    rawText: text,
    receivedAt,
    ...(language ? { requestedLanguage: language } : {}),
  });
}

export interface PipelineDeps {
  kb: KnowledgeBase;
  router: NodeRouter;
  integrator: RealWorldIntegrator;
  synthesizer: ResponseSynthesizer;
  logger: Logger;
  requestDeadlineMs: number;
}

type NodeOutcome = { ok: true; result: NodeResult } | { ok: false; reason: string };

/**
 * detect, match and classify run in order; the language node and the search
 * enrichment then run side by side under one request deadline.
 */
export class QueryPipeline {
  constructor(private readonly deps: PipelineDeps) {}

  async handle(input: QueryInput): Promise<ResponseEnvelope> {
    const { kb, router, integrator, synthesizer, logger } = this.deps;
    const started = Date.now();

    const query = createQuery(input.text, input.language, router.supportedLanguages());
    const detection = detectLanguage(query.rawText);
    const culturalMatches = kb.match(query.rawText, detection.detectedLanguage);
    const intent = classifyIntent(query.rawText, culturalMatches);
    const node = router.resolve(query, detection);

    const deadline = new AbortController();
    const timer = setTimeout(() => deadline.abort(), this.deps.requestDeadlineMs);

    const [outcome, realWorldData] = await Promise.all([
      router
        .dispatch(node, query, detection, intent, culturalMatches, deadline.signal)
        .then(
          (result): NodeOutcome => ({ ok: true, result }),
          (error: unknown): NodeOutcome => ({ ok: false, reason: describeError(error) })
        ),
      integrator.enrich(query.rawText, node.language, deadline.signal),
    ]).finally(() => clearTimeout(timer));

    const envelope = synthesizer.synthesize({
      query,
      detection,
      intent,
      culturalMatches,
      language: node.language,
      ...(outcome.ok ? { nodeResult: outcome.result } : { nodeFailure: outcome.reason }),
      realWorldData,
      elapsedMs: Date.now() - started,
    });

    logger.info(
      {
        detectedLanguage: detection.detectedLanguage,
        nodeId: envelope.response.nodeId,
        intent: envelope.response.intent,
        confidence: envelope.response.confidence,
        enriched: realWorldData !== undefined,
        ms: envelope.processingTimeMs,
      },
      'Query handled'
    );
    return envelope;
  }
}
