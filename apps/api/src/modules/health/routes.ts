import type { FastifyInstance } from 'fastify';
import { checkHealth, HealthSchema } from './services.js';
import type { SicCatalog } from '../sic-codes/services/catalog.js';

export type HealthRoutesOptions = { catalog: SicCatalog; nodeEnv: string };

export default async function healthRoutes(app: FastifyInstance, opts: HealthRoutesOptions) {
  const report = () => checkHealth(opts.catalog, opts.nodeEnv);

  // must precede the GET, which would otherwise generate its own HEAD route
  app.head(
    '/healthz',
    { config: { rateLimit: { max: 1200, timeWindow: '1 minute' } } },
    async (_req, reply) => {
      reply.header('cache-control', 'no-store');
      return reply.code(report().ok ? 200 : 503).send();
    }
  );

  // Simple liveness
  app.get(
    '/healthz',
    {
      schema: { tags: ['Health'], response: { 200: HealthSchema, 503: HealthSchema } },
      config: { rateLimit: { max: 600, timeWindow: '1 minute' } },
    },
    async (_req, reply) => {
      const health = report();
      reply.header('cache-control', 'no-store');
      return reply.code(health.ok ? 200 : 503).send(health);
    }
  );

  // Readiness/details
  app.get(
    '/health',
    {
      schema: { tags: ['Health'], response: { 200: HealthSchema, 503: HealthSchema } },
      config: { rateLimit: { max: 300, timeWindow: '1 minute' } },
    },
    async (_req, reply) => {
      const health = report();
      reply.header('cache-control', 'no-store');
      return reply.code(health.ok ? 200 : 503).send(health);
    }
  );
}
