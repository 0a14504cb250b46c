import {
  CountriesListQuerySchema,
  CountriesListResponseSchema,
  CountryByNameParamsSchema,
  CountryResponseSchema,
  ErrorResponseSchema,
  RefreshAcceptedResponseSchema,
} from '@countryfx/types';
import type { FastifyInstance } from 'fastify';
import { ZodTypeProvider } from 'fastify-type-provider-zod';
import { readFile } from 'node:fs/promises';
import { toCountryResponse } from '../serializers.js';

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

export default async function countriesRoutes(app: FastifyInstance) {
  const r = app.withTypeProvider<ZodTypeProvider>();

  // POST /countries/refresh
  r.post(
    '/refresh',
    {
      schema: {
        tags: ['Countries'],
        description:
          'Fetches both sources, then continues the refresh in the background. ' +
          'Responds 503 when a source is unreachable; nothing is written in that case.',
        response: { 200: RefreshAcceptedResponseSchema, 503: ErrorResponseSchema },
      },
      config: { rateLimit: { max: 12, timeWindow: '1 minute' } },
    },
    async (req) => {
      const ticket = await app.ctx.orchestrator.trigger();
      req.log.info({ cycleId: ticket.cycleId }, 'refresh dispatched');
      return { message: 'Refresh started in background' };
    }
  );

  // GET /countries?region=&currency=&sort=
  r.get(
    '/',
    {
      schema: {
        tags: ['Countries'],
        querystring: CountriesListQuerySchema,
        response: { 200: CountriesListResponseSchema },
      },
    },
    async (req) => {
      const rows = await app.ctx.repository.filter(req.query);
      return rows.map(toCountryResponse);
    }
  );

  // GET /countries/image
  r.get(
    '/image',
    {
      schema: {
        tags: ['Countries'],
        description:
          'Latest summary PNG. The file is overwritten in place by each refresh, ' +
          'so a request racing a write may receive a truncated image.',
        response: { 404: ErrorResponseSchema },
      },
    },
    async (_req, reply) => {
      let png: Buffer;
      try {
        png = await readFile(app.ctx.env.reportPath);
      } catch (err) {
        if (isMissingFile(err)) return reply.notFound('Summary image not found');
        throw err;
      }
      return reply.header('cache-control', 'no-store').type('image/png').send(png);
    }
  );

  // GET /countries/:name
  r.get(
    '/:name',
    {
      schema: {
        tags: ['Countries'],
        params: CountryByNameParamsSchema,
        response: { 200: CountryResponseSchema, 404: ErrorResponseSchema },
      },
    },
    async (req, reply) => {
      const row = await app.ctx.repository.getByName(req.params.name);
      if (!row) return reply.notFound('Country not found');
      return toCountryResponse(row);
    }
  );

  // DELETE /countries/:name
  r.delete(
    '/:name',
    {
      schema: {
        tags: ['Countries'],
        params: CountryByNameParamsSchema,
        response: { 404: ErrorResponseSchema },
      },
    },
    async (req, reply) => {
      const deleted = await app.ctx.repository.deleteByName(req.params.name);
      if (!deleted) return reply.notFound('Country not found');
      return reply.code(204).send();
    }
  );
}
