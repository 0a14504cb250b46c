import type { FastifyError, FastifyPluginAsync } from 'fastify';
import fp from 'fastify-plugin';
import {
  hasZodFastifySchemaValidationErrors,
  isResponseSerializationError,
} from 'fastify-type-provider-zod';
import {
  errorResponse,
  errorResponseForStatus,
  PipelineError,
  SourceUnavailableError,
} from '../lib/errors.js';

const plugin: FastifyPluginAsync = fp(async (app) => {
  app.setErrorHandler((err: FastifyError, req, reply) => {
    if (err instanceof SourceUnavailableError) {
      return reply.status(err.statusCode).send(err.toResponse());
    }

    if (hasZodFastifySchemaValidationErrors(err)) {
      return reply.status(400).send(errorResponseForStatus(400, err.validation));
    }

    if (isResponseSerializationError(err)) {
      req.log.error({ err, method: err.method, url: err.url }, 'response serialization failed');
      return reply.status(500).send(errorResponseForStatus(500));
    }

    const raw = err instanceof PipelineError ? err.statusCode : (err.statusCode ?? 500);
    const status = Number.isFinite(raw) && raw >= 400 && raw <= 599 ? raw : 500;

    if (status >= 500) {
      req.log.error({ err }, 'request_error');
      return reply.status(status).send(errorResponseForStatus(status));
    }

    const message = typeof err.message === 'string' && err.message ? err.message : 'Bad request';
    return reply.status(status).send(errorResponse(message));
  });

  app.setNotFoundHandler((_req, reply) => {
    return reply.status(404).send(errorResponse('Not found'));
  });
});

export default plugin;
