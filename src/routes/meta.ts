import type { FastifyInstance, FastifyPluginAsync } from 'fastify';
import type { LanguageCatalog } from '../lib/languages';
import type { NodeRouter } from '../lib/nodes/router';
import type { StatsStore } from '../lib/stats';
import { LANGUAGES } from '../lib/types';

export interface MetaRouteOptions {
  languages: LanguageCatalog;
  router: NodeRouter;
  stats: StatsStore;
}

const metaRoutes: FastifyPluginAsync<MetaRouteOptions> = async (app: FastifyInstance, opts) => {
  app.get('/examples', async () => {
    const examples: Record<string, string[]> = {};
    for (const language of LANGUAGES) examples[language] = opts.languages[language].examples;
    return { examples };
  });

  app.get('/languages', async () => ({
    supportedLanguages: opts.router.supportedLanguages(),
    languages: opts.languages,
  }));

  app.get('/federation/status', async () => {
    const snapshot = await opts.stats.snapshot();
    const nodes = opts.router.status();
    return {
      ...snapshot,
      store: opts.stats.kind,
      participatingNodes: nodes.length,
      nodes,
    };
  });
};

export default metaRoutes;
