import type { Health } from '@countryfx/types';
import type { CountryRepository } from '../countries/repository/index.js';

export type HealthDeps = {
  repository: CountryRepository;
  nodeEnv: string;
  now?: () => Date;
};

export async function checkHealth(deps: HealthDeps): Promise<Health> {
  const now = deps.now ?? (() => new Date());
  const startedAt = Date.now();

  let storeOk = false;
  let storeLatencyMs: number | null = null;
  let lastRefreshedAt: Date | null = null;
  try {
    const t0 = Date.now();
    await deps.repository.ping();
    storeOk = true;
    storeLatencyMs = Date.now() - t0;
    lastRefreshedAt = await deps.repository.lastRefreshTime();
  } catch {
    storeOk = false;
  }

  const at = now();
  return {
    ok: storeOk,
    service: 'countryfx-api',
    time: {
      server: at.toISOString(),
      uptimeSec: Math.floor(process.uptime()),
    },
    store: { kind: deps.repository.kind, ok: storeOk, latencyMs: storeLatencyMs },
    refresh: {
      lastRefreshedAt: lastRefreshedAt ? lastRefreshedAt.toISOString() : null,
      ageHours: lastRefreshedAt
        ? Math.max(0, (at.getTime() - lastRefreshedAt.getTime()) / 36e5)
        : null,
    },
    version: {
      commit: process.env.COMMIT_SHA || null,
      env: deps.nodeEnv,
    },
    durationMs: Date.now() - startedAt,
  };
}
