// Fastify plugin that renders every error as { detail: [{ msg }] }
import fp from 'fastify-plugin';
import type { FastifyError } from 'fastify';
import { NotFoundError, toErrorResponse } from '../shared/errors.js';

const errorsPlugin = fp(async (app) => {
  app.setErrorHandler(async (err: FastifyError, request, reply) => {
    const { statusCode, body } = toErrorResponse(err);
    if (statusCode >= 500) {
      request.log.error({ err }, 'request failed');
    } else {
      request.log.warn({ reason: err.message }, 'request rejected');
    }
    return reply.code(statusCode).send(body);
  });

  app.setNotFoundHandler(async (_request, reply) => {
    const { statusCode, body } = toErrorResponse(new NotFoundError());
    return reply.code(statusCode).send(body);
  });
});

export default errorsPlugin;
