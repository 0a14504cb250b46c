import Fastify from 'fastify';
import cors from '@fastify/cors';
import errorHandler from './plugins/error-handler.js';
import healthPublicRoutes from './modules/health/routes/public.js';
import helmet from '@fastify/helmet';
import metricsHttp from './plugins/prometheus/metrics-http.js';
import rateLimit from '@fastify/rate-limit';
import sensible from '@fastify/sensible';
import swaggerPlugin from './plugins/swagger.js';
import { countriesRoutes, statusRoutes } from './modules/countries/routes/index.js';
import type { AppContext } from './context.js';
import { serializerCompiler, validatorCompiler, ZodTypeProvider } from 'fastify-type-provider-zod';

export async function buildServer(ctx: AppContext) {
  const { env } = ctx;

  const app = Fastify({
    loggerInstance: ctx.logger,
    bodyLimit: 1024 * 1024,
    trustProxy: true,
  }).withTypeProvider<ZodTypeProvider>();

  app.setValidatorCompiler(validatorCompiler);
  app.setSerializerCompiler(serializerCompiler);
  app.decorate('ctx', ctx);

  await app.register(helmet, { contentSecurityPolicy: false });

  await app.register(cors, {
    origin: env.webOrigin ? [env.webOrigin] : false,
    methods: ['GET', 'POST', 'DELETE', 'OPTIONS'],
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
    ban: 0,
    allowList: [],
  });

  await app.register(metricsHttp);

  await app.register(healthPublicRoutes); // /healthz
  await app.register(statusRoutes); // /status
  await app.register(countriesRoutes, { prefix: '/countries' });

  return app;
}
