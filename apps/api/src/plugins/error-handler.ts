import type { FastifyError, FastifyPluginAsync } from 'fastify';
import fp from 'fastify-plugin';
import { errorResponse, errorResponseForStatus } from '../lib/errors.js';

function statusOf(err: FastifyError): number {
  const raw = err.statusCode ?? 500;
  return Number.isInteger(raw) && raw >= 400 && raw <= 599 ? raw : 500;
}

const plugin: FastifyPluginAsync = fp(async (app) => {
  app.setErrorHandler((err: FastifyError, req, reply) => {
    if (err.validation) {
      return reply
        .status(400)
        .send(errorResponse('Request validation failed', 'ERR_VALIDATION', err.validation));
    }

    const status = statusOf(err);
    if (status >= 500) {
      req.log.error({ err }, 'request_error');
      return reply.status(status).send(errorResponseForStatus(status, 'Internal Server Error'));
    }

    req.log.info({ err: { message: err.message, code: err.code } }, 'request_rejected');
    const message = err.message || 'Bad Request';
    return reply.status(status).send(errorResponseForStatus(status, message));
  });

  app.setNotFoundHandler((req, reply) => {
    reply.status(404).send(errorResponseForStatus(404, `Route ${req.method} ${req.url} not found`));
  });
});

export default plugin;
