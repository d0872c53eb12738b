import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest } from 'fastify';
import { httpRequestDuration, httpRequestsTotal, registry } from '../../lib/metrics.js';

function routeLabel(req: FastifyRequest) {
  return req.routeOptions.url ?? 'unmatched';
}

export default fp(async (app: FastifyInstance) => {
  app.addHook('onResponse', async (req, reply) => {
    const labels = {
      method: req.method,
      route: routeLabel(req),
      status_code: String(reply.statusCode),
    };
    httpRequestsTotal.inc(labels);
    httpRequestDuration.observe(labels, reply.elapsedTime / 1000);
  });

  app.get('/metrics', { schema: { hide: true } }, async (_req, reply) => {
    reply.header('Content-Type', registry.contentType);
    return registry.metrics();
  });
});
