import { mkdtemp, rm, stat, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
  CYCLE_AT,
  fakeSources,
  rawCountry,
  sampleCountries,
  sampleRates,
} from '../../../../test/fixtures/countries.js';
import { PersistenceError, SourceUnavailableError } from '../../../lib/errors.js';
import { TaskQueue } from '../../../lib/task-queue.js';
import { MemoryCountryRepository } from '../repository/index.js';
import { RefreshOrchestrator, type RefreshOrchestratorDeps } from './refresh-orchestrator.js';

const offline = async (): Promise<Buffer> => {
  throw new Error('offline');
};

describe('RefreshOrchestrator', () => {
  let dir: string;
  let repository: MemoryCountryRepository;
  let queue: TaskQueue;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'countryfx-refresh-'));
    repository = new MemoryCountryRepository();
    queue = new TaskQueue(2);
  });

  afterEach(async () => {
    await queue.onIdle();
    await rm(dir, { recursive: true, force: true });
  });

  function build(overrides: Partial<RefreshOrchestratorDeps> = {}) {
    return new RefreshOrchestrator({
      repository,
      queue,
      sources: fakeSources(sampleCountries, sampleRates),
      reportPath: join(dir, 'summary.png'),
      random: () => 0.5,
      loadFlag: offline,
      now: () => CYCLE_AT,
      ...overrides,
    });
  }

  it('runs a full cycle in the background', async () => {
    const ticket = await build().trigger();
    expect(ticket.acceptedAt).toEqual(CYCLE_AT);

    const outcome = await ticket.completion;

    expect(outcome).toMatchObject({
      status: 'succeeded',
      cycleId: ticket.cycleId,
      persisted: { affected: 2, chunks: 1, records: 2 },
      report: 'written',
    });
    expect(await repository.count()).toBe(2);

    const nigeria = await repository.getByName('nigeria');
    expect(nigeria?.exchangeRate).toBe('1600.00000000');
    expect(nigeria?.estimatedGdp).toBe('937.50');

    const atlantis = await repository.getByName('atlantis');
    expect(atlantis?.currencyCode).toBeNull();
    expect(atlantis?.estimatedGdp).toBe('0.00');

    expect(await repository.lastRefreshTime()).toEqual(CYCLE_AT);
    expect((await stat(join(dir, 'summary.png'))).isFile()).toBe(true);
  });

  it('keeps GDP within the multiplier bounds with real randomness', async () => {
    const ticket = await build({ random: Math.random }).trigger();
    await ticket.completion;

    const gdp = Number((await repository.getByName('nigeria'))?.estimatedGdp);
    expect(gdp).toBeGreaterThanOrEqual(625);
    expect(gdp).toBeLessThan(1250);
  });

  it('reuses the precheck payloads instead of fetching twice', async () => {
    const sources = fakeSources(sampleCountries, sampleRates);
    const ticket = await build({ sources }).trigger();
    await ticket.completion;

    expect(sources.countries.calls).toBe(1);
    expect(sources.exchangeRates.calls).toBe(1);
  });

  it('rejects before writing when the countries source is down', async () => {
    const sources = fakeSources(new SourceUnavailableError('countries', 'HTTP 500'), sampleRates);

    const err = await build({ sources })
      .trigger()
      .catch((e: unknown) => e);

    expect(err).toBeInstanceOf(SourceUnavailableError);
    expect(err instanceof SourceUnavailableError && err.source).toBe('countries');
    expect(sources.exchangeRates.calls).toBe(0);
    expect(queue.pending + queue.active).toBe(0);
    expect(await repository.count()).toBe(0);
  });

  it('rejects naming the exchange rate source when it is down', async () => {
    const sources = fakeSources(
      sampleCountries,
      new SourceUnavailableError('exchange_rates', 'timed out after 30000ms')
    );

    await expect(build({ sources }).trigger()).rejects.toMatchObject({ source: 'exchange_rates' });
    expect(await repository.count()).toBe(0);
  });

  it('reports a persistence failure on the completion, not the trigger', async () => {
    repository.upsert = async () => {
      throw new Error('relation "countries" does not exist');
    };

    const ticket = await build().trigger();
    const outcome = await ticket.completion;

    expect(outcome.status).toBe('failed');
    if (outcome.status !== 'failed') return;
    expect(outcome.stage).toBe('persist');
    expect(outcome.error).toBeInstanceOf(PersistenceError);
  });

  it('treats a report failure as non-fatal', async () => {
    const blocker = join(dir, 'blocker');
    await writeFile(blocker, 'x');

    const ticket = await build({ reportPath: join(blocker, 'summary.png') }).trigger();
    const outcome = await ticket.completion;

    expect(outcome).toMatchObject({ status: 'succeeded', report: 'failed' });
    expect(await repository.count()).toBe(2);
  });

  it('keeps last_refreshed_at moving forward across cycles', async () => {
    const later = new Date(CYCLE_AT.getTime() + 60_000);
    const first = await build({ now: () => later }).trigger();
    await first.completion;

    const stale = await build({
      sources: fakeSources([rawCountry({ population: 1 })], sampleRates),
    }).trigger();
    const outcome = await stale.completion;

    expect(outcome).toMatchObject({ status: 'succeeded', persisted: { affected: 0 } });
    const nigeria = await repository.getByName('Nigeria');
    expect(nigeria?.population).toBe(1000);
    expect(nigeria?.lastRefreshedAt).toEqual(later);
  });

  it('skips the report for an older cycle after a newer one wrote it', async () => {
    let clock = CYCLE_AT.getTime() + 60_000;
    const orchestrator = build({ now: () => new Date(clock) });

    const newer = await orchestrator.trigger();
    await newer.completion;

    clock = CYCLE_AT.getTime();
    const older = await orchestrator.trigger();
    await expect(older.completion).resolves.toMatchObject({ report: 'skipped' });
  });

  it('regenerates the report from stored data', async () => {
    const ticket = await build().trigger();
    await ticket.completion;

    const report = await build().regenerateReport();

    expect(report).toMatchObject({ status: 'written', total: 2 });
    expect(report.top.map((t) => t.name)).toEqual(['Nigeria', 'Atlantis']);
  });
});
