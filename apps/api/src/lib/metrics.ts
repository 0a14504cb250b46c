import { collectDefaultMetrics, Counter, Gauge, Histogram, Registry } from 'prom-client';

export const registry = new Registry();
collectDefaultMetrics({ register: registry, prefix: 'countryfx_' });

export type RefreshCycleOutcome = 'succeeded' | 'failed';

export const refreshCycles = new Counter({
  name: 'countryfx_refresh_cycles_total',
  help: 'Detached refresh cycles by outcome.',
  labelNames: ['outcome'] as const,
  registers: [registry],
});

export const refreshDuration = new Histogram({
  name: 'countryfx_refresh_duration_seconds',
  help: 'Wall time of the detached refresh phase.',
  labelNames: ['outcome'] as const,
  buckets: [0.5, 1, 2, 5, 10, 30, 60, 120, 300],
  registers: [registry],
});

export const rowsUpserted = new Counter({
  name: 'countryfx_rows_upserted_total',
  help: 'Rows reported affected by the store across upsert chunks.',
  registers: [registry],
});

export const sourceFailures = new Counter({
  name: 'countryfx_source_failures_total',
  help: 'External source fetch failures.',
  labelNames: ['source'] as const,
  registers: [registry],
});

export const reportOutcomes = new Counter({
  name: 'countryfx_report_outcomes_total',
  help: 'Summary report attempts by outcome.',
  labelNames: ['outcome'] as const,
  registers: [registry],
});

export const lastRefreshSuccess = new Gauge({
  name: 'countryfx_refresh_last_success_timestamp',
  help: 'UNIX timestamp (seconds) of the last successful refresh cycle.',
  registers: [registry],
});

export const httpRequestDuration = new Histogram({
  name: 'countryfx_http_request_duration_seconds',
  help: 'HTTP request duration in seconds',
  labelNames: ['method', 'route', 'status_code'] as const,
  buckets: [0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2, 5],
  registers: [registry],
});

export const httpRequestsTotal = new Counter({
  name: 'countryfx_http_requests_total',
  help: 'Total HTTP requests',
  labelNames: ['method', 'route', 'status_code'] as const,
  registers: [registry],
});

export function startRefreshTimer() {
  const end = refreshDuration.startTimer();
  return (outcome: RefreshCycleOutcome) => end({ outcome });
}

export function setLastRefreshNow() {
  lastRefreshSuccess.set(Date.now() / 1000);
}
