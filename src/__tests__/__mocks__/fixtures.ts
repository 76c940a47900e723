// Shared test doubles: the real data files plus in-process stand-ins for nodes and search.
import { fileURLToPath } from 'node:url';
import type { SearchConfig } from '../../lib/config';
import { KnowledgeBase } from '../../lib/culture';
import { classifyIntent } from '../../lib/intent';
import { detectLanguage } from '../../lib/detect';
import { createLogger } from '../../lib/logger';
import type { LanguageNode, NodeRequest } from '../../lib/nodes/node';
import { loadProfiles } from '../../lib/nodes/profiles';
import type { RawSearchHit, SearchOptions, SearchProvider } from '../../lib/search/providers';
import { AbortedError } from '../../lib/timeout';
import type { Language, NodeResult } from '../../lib/types';

export const dataFile = (name: string) => fileURLToPath(new URL(`../../../data/${name}`, import.meta.url));

export const kb = KnowledgeBase.fromFile(dataFile('cultural-kb.json'));
export const profiles = loadProfiles(dataFile('node-profiles.json'));
export const silentLogger = createLogger('silent');

export const searchConfig: SearchConfig = {
  provider: 'none',
  timeoutMs: 1000,
  maxResults: 5,
  summaryTopN: 3,
  concurrency: 2,
  cacheTtlMs: 60_000,
  cacheMax: 50,
};

/** Resolves never; rejects once `signal` aborts. */
export function untilAborted<T>(signal: AbortSignal | undefined, label: string): Promise<T> {
  return new Promise<T>((_, reject) => {
    signal?.addEventListener('abort', () => reject(new AbortedError(label)), { once: true });
  });
}

type Responder = (text: string, language: Language, options: SearchOptions) => Promise<RawSearchHit[]>;

export class StubSearchProvider implements SearchProvider {
  readonly name = 'stub';
  readonly enabled = true;
  readonly calls: Array<{ text: string; language: Language; limit: number }> = [];

  constructor(private respond: Responder = async () => []) {}

  respondWith(respond: Responder): void {
    this.respond = respond;
  }

  search(text: string, language: Language, options: SearchOptions): Promise<RawSearchHit[]> {
    this.calls.push({ text, language, limit: options.limit });
    return this.respond(text, language, options);
  }
}

export class StubNode implements LanguageNode {
  readonly kind = 'local' as const;
  readonly requests: NodeRequest[] = [];

  constructor(
    readonly id: string,
    readonly language: Language,
    private readonly behaviour: (request: NodeRequest, signal: AbortSignal) => Promise<NodeResult>
  ) {}

  process(request: NodeRequest, signal: AbortSignal): Promise<NodeResult> {
    this.requests.push(request);
    return this.behaviour(request, signal);
  }
}

export function hangingNode(language: Language): StubNode {
  return new StubNode(`${language}_node`, language, (_request, signal) => untilAborted(signal, `${language}_node`));
}

/** detection, matches and intent for `text`, as the pipeline would compute them. */
export function analyse(text: string) {
  const detection = detectLanguage(text);
  const culturalMatches = kb.match(text, detection.detectedLanguage);
  const intent = classifyIntent(text, culturalMatches);
  return { detection, culturalMatches, intent };
}

export const sampleHits: RawSearchHit[] = [
  {
    title: 'Ganesh festival',
    snippet:
      'Ganesh Chaturthi brings families together for ten days of worship. Modak sweets are prepared at home (usually steamed) for the festival.',
    link: 'https://www.a.com/ganesh',
  },
  {
    title: 'Ganesh celebrations in Pune',
    snippet: 'Pune hosts large Ganesh pandals every year. Visitors queue for hours to see the idols during the festival.',
    link: 'https://b.com/pune',
  },
  {
    title: 'Modak recipes',
    snippet:
      'Modak is the favourite sweet of Ganesh. Steamed modak uses rice flour, jaggery and coconut for the festival season.',
    link: 'https://c.com/modak',
  },
];
