import swagger from '@fastify/swagger';
import swaggerUI from '@fastify/swagger-ui';
import { jsonSchemaTransform } from 'fastify-type-provider-zod';
import { FastifyPluginAsync } from 'fastify';
import fp from 'fastify-plugin';

const swaggerPlugin: FastifyPluginAsync<{ serverUrl?: string }> = async (app, opts) => {
  await app.register(swagger, {
    openapi: {
      info: { title: 'Countryfx API', version: '1.0.0' },
      servers: [{ url: opts.serverUrl ?? 'http://localhost:8000' }],
      tags: [
        { name: 'Countries', description: 'Country snapshot, refresh and summary image' },
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
