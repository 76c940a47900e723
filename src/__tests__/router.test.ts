import { describe, it, expect, afterEach, vi } from 'vitest';
import { NodeUnavailableError, UnsupportedLanguageError } from '../lib/errors';
import { LocalLanguageNode } from '../lib/nodes/local';
import { buildNodes, NodeRouter } from '../lib/nodes/router';
import { createQuery } from '../lib/pipeline';
import type { Language } from '../lib/types';
import { analyse, hangingNode, kb, profiles, silentLogger, StubNode } from './__mocks__/fixtures';

const localNodes = (...languages: Language[]) =>
  languages.map((language) => new LocalLanguageNode(language, profiles[language], kb));

const HINDI_TEXT = 'दिवाली की सफाई कैसे करें';

describe('NodeRouter.resolve', () => {
  const router = new NodeRouter(localNodes('hindi', 'telugu', 'marathi', 'english'), 1000, silentLogger);

  it('routes to the detected language by default', () => {
    const { detection } = analyse(HINDI_TEXT);
    expect(router.resolve(createQuery(HINDI_TEXT), detection).id).toBe('hindi_node');
  });

  it('lets an explicitly requested language override detection', () => {
    const { detection } = analyse(HINDI_TEXT);
    expect(router.resolve(createQuery(HINDI_TEXT, 'telugu'), detection).id).toBe('telugu_node');
  });

  it('falls back to detection when the requested language has no node', () => {
    const partial = new NodeRouter(localNodes('hindi'), 1000, silentLogger);
    const { detection } = analyse(HINDI_TEXT);
    expect(partial.resolve(createQuery(HINDI_TEXT, 'telugu'), detection).id).toBe('hindi_node');
  });

  it('rejects a query no node can serve', () => {
    const englishOnly = new NodeRouter(localNodes('english'), 1000, silentLogger);
    const { detection } = analyse(HINDI_TEXT);
    expect(() => englishOnly.resolve(createQuery(HINDI_TEXT), detection)).toThrow(
      new UnsupportedLanguageError('hindi', ['english'])
    );
    expect(() => englishOnly.resolve(createQuery(HINDI_TEXT), detection)).toThrow(
      "Language 'hindi' is not supported. Supported languages: english"
    );
  });

  it('lists supported languages in a fixed order', () => {
    const partial = new NodeRouter(localNodes('english', 'hindi'), 1000, silentLogger);
    expect(partial.supportedLanguages()).toEqual(['hindi', 'english']);
  });

  it('refuses two nodes for one language', () => {
    expect(() => new NodeRouter(localNodes('hindi', 'hindi'), 1000, silentLogger)).toThrow(
      'Duplicate node for language hindi'
    );
  });
});

describe('NodeRouter.route', () => {
  it('returns the node result', async () => {
    const router = new NodeRouter(localNodes('hindi'), 1000, silentLogger);
    const { detection, intent, culturalMatches } = analyse(HINDI_TEXT);
    const result = await router.route(createQuery(HINDI_TEXT), detection, intent, culturalMatches);
    expect(result.nodeId).toBe('hindi_node');
    expect(result.responsePayload.kind).toBe('cultural_guide');
  });

  it('turns a timeout into NodeUnavailable', async () => {
    const router = new NodeRouter([hangingNode('hindi')], 20, silentLogger);
    const { detection, intent, culturalMatches } = analyse(HINDI_TEXT);
    const routed = router.route(createQuery(HINDI_TEXT), detection, intent, culturalMatches);
    await expect(routed).rejects.toBeInstanceOf(NodeUnavailableError);
    await expect(routed).rejects.toThrow('Language node hindi_node unavailable: hindi_node timed out after 20ms');
  });

  it('turns a node crash into NodeUnavailable', async () => {
    const crashing = new StubNode('hindi_node', 'hindi', async () => {
      throw new Error('boom');
    });
    const router = new NodeRouter([crashing], 1000, silentLogger);
    const { detection, intent, culturalMatches } = analyse(HINDI_TEXT);
    await expect(router.route(createQuery(HINDI_TEXT), detection, intent, culturalMatches)).rejects.toThrow(
      'Language node hindi_node unavailable: boom'
    );
  });

  it('stops waiting when the caller aborts', async () => {
    const router = new NodeRouter([hangingNode('hindi')], 1000, silentLogger);
    const { detection, intent, culturalMatches } = analyse(HINDI_TEXT);
    const controller = new AbortController();
    const routed = router.route(createQuery(HINDI_TEXT), detection, intent, culturalMatches, controller.signal);
    controller.abort();
    await expect(routed).rejects.toThrow('Language node hindi_node unavailable: hindi_node aborted');
  });

  it('passes the node its own language and the shared analysis', async () => {
    const telugu = new StubNode('telugu_node', 'telugu', () => new Promise<never>(() => undefined));
    const router = new NodeRouter([telugu], 10, silentLogger);
    const { detection, intent, culturalMatches } = analyse(HINDI_TEXT);
    await expect(router.route(createQuery(HINDI_TEXT, 'telugu'), detection, intent, culturalMatches)).rejects.toThrow(
      NodeUnavailableError
    );
    expect(telugu.requests).toEqual([{ text: HINDI_TEXT, language: 'telugu', detection, intent, culturalMatches }]);
  });
});

describe('NodeRouter.metrics', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('starts every node at zero', () => {
    const router = new NodeRouter(localNodes('hindi'), 1000, silentLogger);
    expect(router.status()[0].metrics).toEqual({
      totalQueries: 0,
      successfulQueries: 0,
      successRate: 0,
      averageResponseTimeMs: 0,
    });
  });

  it('tracks success rate and mean response time per node', async () => {
    const crashing = new StubNode('telugu_node', 'telugu', async () => {
      throw new Error('boom');
    });
    const router = new NodeRouter([...localNodes('hindi'), crashing], 1000, silentLogger);
    const { detection, intent, culturalMatches } = analyse(HINDI_TEXT);
    vi.spyOn(Date, 'now')
      .mockReturnValueOnce(1000)
      .mockReturnValueOnce(1040)
      .mockReturnValueOnce(2000)
      .mockReturnValueOnce(2020)
      .mockReturnValueOnce(3000)
      .mockReturnValueOnce(3010);

    await router.route(createQuery(HINDI_TEXT), detection, intent, culturalMatches);
    await router.route(createQuery(HINDI_TEXT), detection, intent, culturalMatches);
    await expect(router.route(createQuery(HINDI_TEXT, 'telugu'), detection, intent, culturalMatches)).rejects.toThrow(
      NodeUnavailableError
    );

    expect(router.metrics('hindi_node')).toEqual({
      totalQueries: 2,
      successfulQueries: 2,
      successRate: 1,
      averageResponseTimeMs: 30,
    });
    expect(router.metrics('telugu_node')).toEqual({
      totalQueries: 1,
      successfulQueries: 0,
      successRate: 0,
      averageResponseTimeMs: 10,
    });
    expect(router.status().map((node) => node.metrics.totalQueries)).toEqual([2, 1]);
  });
});

describe('buildNodes', () => {
  it('uses a remote node wherever an endpoint is configured', () => {
    const nodes = buildNodes(
      { timeoutMs: 1000, endpoints: { telugu: 'http://localhost:8002' } },
      kb,
      profiles,
      silentLogger
    );
    expect(nodes.map((n) => [n.language, n.id, n.kind])).toEqual([
      ['hindi', 'hindi_node', 'local'],
      ['telugu', 'telugu_node', 'http'],
      ['marathi', 'marathi_node', 'local'],
      ['english', 'english_node', 'local'],
    ]);
    expect(new NodeRouter(nodes, 1000, silentLogger).status()).toHaveLength(4);
  });
});
