import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest } from 'fastify';
import { httpRequestDuration, httpRequestsTotal, registry } from '../../lib/metrics.js';

function routeLabel(req: FastifyRequest) {
  return req.routeOptions.url ?? 'unmatched';
}

export default fp(async (app: FastifyInstance) => {
  app.addHook('onRequest', async (req) => {
    req._prom_end = httpRequestDuration.startTimer();
  });

  app.addHook('onResponse', async (req, reply) => {
    const labels = {
      method: req.method,
      route: routeLabel(req),
      status_code: String(reply.statusCode),
    };

    httpRequestsTotal.inc(labels);
    req._prom_end?.(labels);
  });

  app.get('/metrics', { schema: { hide: true } }, async (_req, reply) => {
    reply.header('Content-Type', registry.contentType);
    return registry.metrics();
  });
});
