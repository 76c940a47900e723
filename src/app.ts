import Fastify, { type FastifyInstance } from 'fastify';
import formbody from '@fastify/formbody';
import { ZodError } from 'zod';
import type { KnowledgeBase } from './lib/culture';
import { PipelineError, UnsupportedLanguageError } from './lib/errors';
import type { LanguageCatalog } from './lib/languages';
import type { NodeRouter } from './lib/nodes/router';
import type { QueryPipeline } from './lib/pipeline';
import type { RealWorldIntegrator } from './lib/search/integrator';
import type { StatsStore } from './lib/stats';
import healthRoutes from './routes/health';
import metaRoutes from './routes/meta';
import queryRoutes from './routes/query';

export interface AppServices {
  kb: KnowledgeBase;
  router: NodeRouter;
  integrator: RealWorldIntegrator;
  pipeline: QueryPipeline;
  stats: StatsStore;
  languages: LanguageCatalog;
}

export interface AppOptions {
  /** Fastify request logging; off when omitted. */
  logLevel?: string;
}

// Routes stay thin and delegate to src/lib/*.
export async function buildApp(services: AppServices, options: AppOptions = {}): Promise<FastifyInstance> {
  const app = Fastify({ logger: options.logLevel ? { level: options.logLevel } : false });
  await app.register(formbody);

  app.setErrorHandler((error, req, reply) => {
    if (error instanceof PipelineError) {
      return reply.status(error.statusCode).send({
        error: error.code,
        message: error.message,
        ...(error instanceof UnsupportedLanguageError ? { supportedLanguages: error.supportedLanguages } : {}),
      });
    }
    if (error instanceof ZodError) {
      return reply.status(400).send({
        error: 'InvalidQuery',
        message: 'Request body is invalid',
        issues: error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message })),
      });
    }

    const status = error.statusCode && error.statusCode >= 400 ? error.statusCode : 500;
    if (status >= 500) {
      req.log.error({ err: error }, 'Unhandled error');
      return reply.status(status).send({ error: 'InternalError', message: 'Internal server error' });
    }
    return reply.status(status).send({ error: error.code ?? 'BadRequest', message: error.message });
  });

  await app.register(healthRoutes, { prefix: '/health', kb: services.kb, router: services.router, integrator: services.integrator });
  await app.register(queryRoutes, {
    prefix: '/api/v1',
    pipeline: services.pipeline,
    integrator: services.integrator,
    stats: services.stats,
  });
  await app.register(metaRoutes, {
    prefix: '/api/v1',
    languages: services.languages,
    router: services.router,
    stats: services.stats,
  });

  return app;
}
