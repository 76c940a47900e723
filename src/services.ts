import type { AppServices } from './app';
import type { AppConfig } from './lib/config';
import { KnowledgeBase } from './lib/culture';
import { loadLanguageCatalog } from './lib/languages';
import type { Logger } from './lib/logger';
import { loadProfiles } from './lib/nodes/profiles';
import { buildNodes, NodeRouter } from './lib/nodes/router';
import { QueryPipeline } from './lib/pipeline';
import { RealWorldIntegrator } from './lib/search/integrator';
import { makeSearchProvider } from './lib/search/providers';
import { MemoryStatsStore, MongoStatsStore } from './lib/stats';
import { ResponseSynthesizer } from './lib/synthesize';

/**
 * Builds every long-lived component from the configuration. Data files are
 * read here, once; nothing below touches the environment again.
 */
export function createServices(config: AppConfig, logger: Logger): AppServices {
  const kb = KnowledgeBase.fromFile(config.paths.knowledgeBase);
  const profiles = loadProfiles(config.paths.nodeProfiles);
  const languages = loadLanguageCatalog(config.paths.languages);

  const router = new NodeRouter(
    buildNodes(config.nodes, kb, profiles, logger.child({ component: 'node' })),
    config.nodes.timeoutMs,
    logger.child({ component: 'router' })
  );
  const searchLogger = logger.child({ component: 'search' });
  const integrator = new RealWorldIntegrator(
    makeSearchProvider(config.search, profiles, searchLogger),
    profiles,
    config.search,
    searchLogger
  );
  const pipeline = new QueryPipeline({
    kb,
    router,
    integrator,
    synthesizer: new ResponseSynthesizer(profiles),
    logger: logger.child({ component: 'pipeline' }),
    requestDeadlineMs: config.requestDeadlineMs,
  });

  logger.info(
    { kbVersion: kb.version, entries: kb.size, nodes: router.status(), searchProvider: integrator.providerName },
    'Services ready'
  );

  return {
    kb,
    router,
    integrator,
    pipeline,
    stats: config.mongodbUri ? new MongoStatsStore() : new MemoryStatsStore(),
    languages,
  };
}
