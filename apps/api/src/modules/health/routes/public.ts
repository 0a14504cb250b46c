import { HealthSchema } from '@countryfx/types';
import type { FastifyInstance } from 'fastify';
import { ZodTypeProvider } from 'fastify-type-provider-zod';
import { checkHealth } from '../services.js';

export default async function healthPublicRoutes(app: FastifyInstance) {
  const r = app.withTypeProvider<ZodTypeProvider>();
  const deps = () => ({ repository: app.ctx.repository, nodeEnv: app.ctx.env.nodeEnv });

  // Liveness with a store probe
  r.get(
    '/healthz',
    {
      schema: { tags: ['Health'], response: { 200: HealthSchema, 503: HealthSchema } },
      config: { rateLimit: { max: 600, timeWindow: '1 minute' } },
    },
    async (_req, reply) => {
      const report = await checkHealth(deps());
      reply.header('cache-control', 'no-store');
      return reply.code(report.ok ? 200 : 503).send(report);
    }
  );
}
