import { CountriesListResponseSchema, StatusResponseSchema } from '@countryfx/types';
import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
  buildTestContext,
  fakeSources,
  sampleCountries,
  sampleRates,
  type TestContextOptions,
} from '../../../test/fixtures/countries.js';
import type { AppContext } from '../../context.js';
import { SourceUnavailableError } from '../../lib/errors.js';
import { buildServer } from '../../server.js';

let dir: string;
let ctx: AppContext;
let app: Awaited<ReturnType<typeof buildServer>>;

async function start(overrides: Omit<TestContextOptions, 'reportPath'> = {}) {
  ctx = buildTestContext({ reportPath: join(dir, 'summary.png'), ...overrides });
  app = await buildServer(ctx);
}

async function refresh() {
  const res = await app.inject({ method: 'POST', url: '/countries/refresh' });
  await ctx.queue.onIdle();
  return res;
}

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), 'countryfx-routes-'));
});

afterEach(async () => {
  await app.close();
  await ctx.queue.onIdle();
  await rm(dir, { recursive: true, force: true });
});

describe('POST /countries/refresh', () => {
  it('accepts the refresh and persists in the background', async () => {
    await start();

    const res = await refresh();

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ message: 'Refresh started in background' });
    expect(await ctx.repository.count()).toBe(2);
  });

  it('responds 503 naming the unavailable source', async () => {
    await start({
      sources: fakeSources(new SourceUnavailableError('countries', 'HTTP 502'), sampleRates),
    });

    const res = await refresh();

    expect(res.statusCode).toBe(503);
    expect(res.json()).toEqual({
      error: 'External data source unavailable',
      details: 'Could not fetch data from restcountries API',
    });
    expect(await ctx.repository.count()).toBe(0);
  });

  it('names the exchange rate source when it is the one down', async () => {
    await start({
      sources: fakeSources(
        sampleCountries,
        new SourceUnavailableError('exchange_rates', 'invalid JSON body')
      ),
    });

    const res = await refresh();

    expect(res.statusCode).toBe(503);
    expect(res.json().details).toBe('Could not fetch data from exchange rates API');
  });
});

describe('GET /countries', () => {
  it('lists stored countries in the wire shape', async () => {
    await start();
    await refresh();

    const res = await app.inject({ method: 'GET', url: '/countries' });

    expect(res.statusCode).toBe(200);
    const body = CountriesListResponseSchema.parse(res.json());
    expect(body.map((c) => c.name)).toEqual(['Atlantis', 'Nigeria']);
    expect(body[1]).toEqual({
      id: expect.any(Number),
      name: 'Nigeria',
      capital: 'Abuja',
      region: 'Africa',
      population: 1000,
      currency_code: 'NGN',
      exchange_rate: 1600,
      estimated_gdp: 937.5,
      flag_url: 'https://flagcdn.com/ng.svg',
      last_refreshed_at: body[0]?.last_refreshed_at,
    });
    expect(body[0]).toMatchObject({ currency_code: null, exchange_rate: null, estimated_gdp: 0 });
  });

  it('filters by region and currency without regard to case', async () => {
    await start();
    await refresh();

    const byRegion = await app.inject({ method: 'GET', url: '/countries?region=AFRICA' });
    expect(byRegion.json().map((c: { name: string }) => c.name)).toEqual(['Nigeria']);

    const byCurrency = await app.inject({ method: 'GET', url: '/countries?currency=ngn' });
    expect(byCurrency.json().map((c: { name: string }) => c.name)).toEqual(['Nigeria']);

    const none = await app.inject({ method: 'GET', url: '/countries?region=Europe' });
    expect(none.json()).toEqual([]);
  });

  it('sorts by estimated GDP', async () => {
    await start();
    await refresh();

    const desc = await app.inject({ method: 'GET', url: '/countries?sort=gdp_desc' });
    expect(desc.json().map((c: { name: string }) => c.name)).toEqual(['Nigeria', 'Atlantis']);

    const asc = await app.inject({ method: 'GET', url: '/countries?sort=gdp_asc' });
    expect(asc.json().map((c: { name: string }) => c.name)).toEqual(['Atlantis', 'Nigeria']);
  });

  it('rejects an unknown sort with 400', async () => {
    await start();

    const res = await app.inject({ method: 'GET', url: '/countries?sort=population' });

    expect(res.statusCode).toBe(400);
    expect(res.json().error).toBe('Validation failed');
  });
});

describe('GET /countries/:name', () => {
  it('finds a country regardless of case', async () => {
    await start();
    await refresh();

    const res = await app.inject({ method: 'GET', url: '/countries/nIgErIa' });

    expect(res.statusCode).toBe(200);
    expect(res.json().name).toBe('Nigeria');
  });

  it('responds 404 for an unknown name', async () => {
    await start();

    const res = await app.inject({ method: 'GET', url: '/countries/Narnia' });

    expect(res.statusCode).toBe(404);
    expect(res.json()).toEqual({ error: 'Country not found' });
  });
});

describe('DELETE /countries/:name', () => {
  it('deletes once, then reports 404', async () => {
    await start();
    await refresh();

    const first = await app.inject({ method: 'DELETE', url: '/countries/nigeria' });
    expect(first.statusCode).toBe(204);
    expect(first.body).toBe('');

    const second = await app.inject({ method: 'DELETE', url: '/countries/nigeria' });
    expect(second.statusCode).toBe(404);
    expect(second.json()).toEqual({ error: 'Country not found' });
    expect(await ctx.repository.count()).toBe(1);
  });
});

describe('GET /countries/image', () => {
  it('responds 404 before any report exists', async () => {
    await start();

    const res = await app.inject({ method: 'GET', url: '/countries/image' });

    expect(res.statusCode).toBe(404);
    expect(res.json()).toEqual({ error: 'Summary image not found' });
  });

  it('serves the PNG written by a refresh', async () => {
    await start();
    await refresh();

    const res = await app.inject({ method: 'GET', url: '/countries/image' });

    expect(res.statusCode).toBe(200);
    expect(res.headers['content-type']).toBe('image/png');
    expect(res.headers['cache-control']).toBe('no-store');
    expect(res.rawPayload.subarray(1, 4).toString('ascii')).toBe('PNG');
  });
});

describe('GET /status', () => {
  it('reports an empty store', async () => {
    await start();

    const res = await app.inject({ method: 'GET', url: '/status' });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ total_countries: 0, last_refreshed_at: null });
  });

  it('reports the count and refresh time after a cycle', async () => {
    await start();
    await refresh();

    const res = await app.inject({ method: 'GET', url: '/status' });
    const body = StatusResponseSchema.parse(res.json());

    expect(body.total_countries).toBe(2);
    expect(body.last_refreshed_at).toBe(
      (await ctx.repository.lastRefreshTime())?.toISOString()
    );
  });
});

describe('operational routes', () => {
  it('answers /healthz from the memory store', async () => {
    await start();

    const res = await app.inject({ method: 'GET', url: '/healthz' });

    expect(res.statusCode).toBe(200);
    expect(res.headers['cache-control']).toBe('no-store');
    expect(res.json()).toMatchObject({
      ok: true,
      service: 'countryfx-api',
      store: { kind: 'memory', ok: true },
      refresh: { lastRefreshedAt: null, ageHours: null },
      version: { env: 'test' },
    });
  });

  it('exposes request metrics', async () => {
    await start();
    await app.inject({ method: 'GET', url: '/status' });

    const res = await app.inject({ method: 'GET', url: '/metrics' });

    expect(res.statusCode).toBe(200);
    expect(res.body).toMatch(/countryfx_http_requests_total\{[^}]*route="\/status"[^}]*\} \d+/);
  });

  it('returns the JSON envelope for unknown routes', async () => {
    await start();

    const res = await app.inject({ method: 'GET', url: '/nope' });

    expect(res.statusCode).toBe(404);
    expect(res.json()).toEqual({ error: 'Not found' });
  });
});
