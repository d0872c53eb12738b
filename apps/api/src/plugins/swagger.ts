import swagger from '@fastify/swagger';
import swaggerUI from '@fastify/swagger-ui';
import { jsonSchemaTransform } from 'fastify-type-provider-zod';
import type { FastifyPluginAsync } from 'fastify';
import fp from 'fastify-plugin';

const swaggerPlugin: FastifyPluginAsync<{ serverUrl?: string }> = async (app, opts) => {
  await app.register(swagger, {
    openapi: {
      info: {
        title: 'SIC Match API',
        description: 'Ranks SIC codes against free-text company descriptions.',
        version: '1.0.0',
      },
      servers: [{ url: opts.serverUrl ?? 'http://localhost:3001' }],
      tags: [
        { name: 'SIC', description: 'Business-activity extraction and SIC matching' },
        { name: 'Health', description: 'Liveness and readiness' },
      ],
    },
    transform: jsonSchemaTransform,
  });

  await app.register(swaggerUI, {
    routePrefix: '/docs',
    uiConfig: {
      deepLinking: true,
    },
  });

  app.get('/openapi.json', { schema: { hide: true } }, async () => app.swagger());
};

export default fp(swaggerPlugin);
