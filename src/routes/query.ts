import type { FastifyInstance, FastifyPluginAsync } from 'fastify';
import { detectLanguage } from '../lib/detect';
import { describeError } from '../lib/errors';
import type { QueryPipeline } from '../lib/pipeline';
import { agenticSearchRequestSchema, detectRequestSchema, queryRequestSchema } from '../lib/schemas';
import { runAgenticSearch } from '../lib/search/agentic';
import type { RealWorldIntegrator } from '../lib/search/integrator';
import { statFromEnvelope, type StatsStore } from '../lib/stats';

export interface QueryRouteOptions {
  pipeline: QueryPipeline;
  integrator: RealWorldIntegrator;
  stats: StatsStore;
}

// Accepts JSON or form bodies (formbody parses the latter into req.body).
const queryRoutes: FastifyPluginAsync<QueryRouteOptions> = async (app: FastifyInstance, opts) => {
  app.post('/query', async (req) => {
    const input = queryRequestSchema.parse(req.body ?? {});
    const envelope = await opts.pipeline.handle(input);

    // Counters are best effort; a failed write never fails the query.
    opts.stats.record(statFromEnvelope(envelope)).catch((err: unknown) => {
      req.log.warn({ err: describeError(err) }, 'Failed to record query stats');
    });

    return envelope;
  });

  app.post('/detect-language', async (req) => {
    const { text } = detectRequestSchema.parse(req.body ?? {});
    return detectLanguage(text);
  });

  app.post('/agentic-search', async (req) => {
    const input = agenticSearchRequestSchema.parse(req.body ?? {});
    return runAgenticSearch(opts.integrator, input);
  });
};

export default queryRoutes;
