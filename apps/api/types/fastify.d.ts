import 'fastify';

import type { AppContext } from '../src/context.js';

declare module 'fastify' {
  interface FastifyRequest {
    // Prometheus HTTP timing helper (set by metrics plugin)
    _prom_end?: (labels?: Record<string, string>) => void;
  }

  interface FastifyInstance {
    // Repository, orchestrator and settings shared by every route
    ctx: AppContext;
  }
}
