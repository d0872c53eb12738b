import Fastify, { type FastifyServerOptions } from 'fastify';
import cors from '@fastify/cors';
import errorHandler from './plugins/error-handler.js';
import healthRoutes from './modules/health/routes.js';
import helmet from '@fastify/helmet';
import metricsHttp from './plugins/prometheus/metrics-http.js';
import rateLimit from '@fastify/rate-limit';
import sensible from '@fastify/sensible';
import sicRoutes from './modules/sic-codes/routes.js';
import swaggerPlugin from './plugins/swagger.js';
import { catalogEntries } from './lib/metrics.js';
import { createSicMatcher } from './modules/sic-codes/services/match.js';
import {
  serializerCompiler,
  validatorCompiler,
  type ZodTypeProvider,
} from 'fastify-type-provider-zod';
import { validateApiRuntimeEnv, type ApiRuntimeEnv } from './lib/env.js';
import type { SicCatalog } from './modules/sic-codes/services/catalog.js';

export type BuildServerOptions = {
  catalog: SicCatalog;
  env?: ApiRuntimeEnv;
  logger?: FastifyServerOptions['logger'];
};

export async function buildServer({
  catalog,
  env = validateApiRuntimeEnv(),
  logger,
}: BuildServerOptions) {
  const app = Fastify({
    logger: logger ?? { level: env.logLevel },
    bodyLimit: 1024 * 1024,
    trustProxy: env.trustProxy,
  }).withTypeProvider<ZodTypeProvider>();

  app.setValidatorCompiler(validatorCompiler);
  app.setSerializerCompiler(serializerCompiler);

  await app.register(helmet, { contentSecurityPolicy: false });

  await app.register(cors, {
    origin: env.webOrigin ? [env.webOrigin] : false,
    methods: ['GET', 'HEAD', 'POST', 'OPTIONS'],
    allowedHeaders: ['content-type'],
    maxAge: 600,
    credentials: false,
  });

  await app.register(sensible);
  await app.register(errorHandler);
  await app.register(swaggerPlugin, { serverUrl: `http://localhost:${env.port}` });

  await app.register(rateLimit, {
    global: true,
    max: env.rateLimitMax,
    timeWindow: env.rateLimitWindow,
    allowList: [],
  });

  await app.register(metricsHttp);

  catalogEntries.set(catalog.size);
  const matcher = createSicMatcher(catalog);

  await app.register(healthRoutes, { catalog, nodeEnv: env.nodeEnv }); // /healthz, /health
  await app.register(sicRoutes, { prefix: '/v1/sic', matcher });

  return app;
}
