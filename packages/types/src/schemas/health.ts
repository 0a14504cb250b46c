import { z } from 'zod/v4';

export const HealthSchema = z.object({
  ok: z.boolean(),
  service: z.string().default('countryfx-api'),
  time: z.object({
    server: z.string(),
    uptimeSec: z.number(),
  }),
  store: z.object({
    kind: z.enum(['postgres', 'memory']),
    ok: z.boolean(),
    latencyMs: z.number().nullable(),
  }),
  refresh: z.object({
    lastRefreshedAt: z.string().nullable(),
    ageHours: z.number().nullable(),
  }),
  version: z.object({
    commit: z.string().nullable(),
    env: z.string(),
  }),
  durationMs: z.number(),
});
