import type { FastifyInstance, FastifyPluginAsync } from 'fastify';
import mongoose from 'mongoose';
import type { KnowledgeBase } from '../lib/culture';
import type { NodeRouter } from '../lib/nodes/router';
import type { RealWorldIntegrator } from '../lib/search/integrator';

export interface HealthRouteOptions {
  kb: KnowledgeBase;
  router: NodeRouter;
  integrator: RealWorldIntegrator;
}

const healthRoutes: FastifyPluginAsync<HealthRouteOptions> = async (app: FastifyInstance, opts) => {
  app.get('/', async () => ({
    ok: true,
    ts: new Date().toISOString(),
    services: {
      nodes: opts.router.status(),
      search: {
        ok: opts.integrator.enabled,
        provider: opts.integrator.providerName,
        cachedQueries: opts.integrator.cacheSize,
      },
      knowledgeBase: {
        version: opts.kb.version,
        entries: opts.kb.size,
      },
    },
  }));

  // Database health check
  app.get('/db', async () => {
    try {
      if (!mongoose.connection.db) {
        return { ok: false, error: 'Database connection not established' };
      }
      await mongoose.connection.db.admin().ping();
      return { ok: true };
    } catch (error) {
      return { ok: false, error: error instanceof Error ? error.message : 'Unknown error' };
    }
  });
};

export default healthRoutes;
