import 'dotenv/config';
import { createAppContext } from './context.js';
import { validateApiRuntimeEnv } from './lib/env.js';
import { logger } from './lib/logger.js';
import { buildServer } from './server.js';

const env = validateApiRuntimeEnv();

async function start() {
  const ctx = createAppContext(env);
  const app = await buildServer(ctx);

  const shutdown = async (signal: string) => {
    app.log.info({ signal }, 'shutting down');
    await app.close();
    await ctx.queue.onIdle();
    process.exit(0);
  };
  const onSignal = (signal: string) => {
    shutdown(signal).catch((err) => {
      app.log.error({ err }, 'shutdown failed');
      process.exit(1);
    });
  };
  process.once('SIGINT', onSignal);
  process.once('SIGTERM', onSignal);

  await app.listen({ port: env.port, host: env.host });
}

start().catch((err) => {
  logger.fatal({ err }, 'api failed to start');
  process.exit(1);
});
