import { StatusResponseSchema } from '@countryfx/types';
import type { FastifyInstance } from 'fastify';
import { ZodTypeProvider } from 'fastify-type-provider-zod';

export default async function statusRoutes(app: FastifyInstance) {
  const r = app.withTypeProvider<ZodTypeProvider>();

  // GET /status
  r.get(
    '/status',
    { schema: { tags: ['Countries'], response: { 200: StatusResponseSchema } } },
    async () => {
      const [total, last] = await Promise.all([
        app.ctx.repository.count(),
        app.ctx.repository.lastRefreshTime(),
      ]);
      return { total_countries: total, last_refreshed_at: last ? last.toISOString() : null };
    }
  );
}
