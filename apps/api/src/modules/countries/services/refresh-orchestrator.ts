import type { EnrichedCountry, RateTable, RawCountryRecord } from '@countryfx/types';
import { randomUUID } from 'node:crypto';
import { describeError, PersistenceError } from '../../../lib/errors.js';
import { logger as defaultLogger, type Logger } from '../../../lib/logger.js';
import { refreshCycles, setLastRefreshNow, startRefreshTimer } from '../../../lib/metrics.js';
import { defaultRandom, type RandomSource } from '../../../lib/random.js';
import type { TaskQueue } from '../../../lib/task-queue.js';
import type { CountryRepository } from '../repository/index.js';
import { enrichAll } from './enrich.js';
import { persistCountries, type PersistResult } from './persist-countries.js';
import { ReportGuard } from './report/report-guard.js';
import {
  type FlagLoader,
  generateSummaryReport,
  type SummaryReport,
} from './report/summary-image.js';
import type { RefreshSources } from './sources.js';

export type RefreshOutcome =
  | {
      status: 'succeeded';
      cycleId: string;
      refreshedAt: Date;
      persisted: PersistResult;
      report: SummaryReport['status'] | 'failed';
    }
  | {
      status: 'failed';
      cycleId: string;
      refreshedAt: Date;
      stage: 'enrich' | 'persist';
      error: Error;
    };

export type RefreshTicket = {
  cycleId: string;
  acceptedAt: Date;
  /** Settles when the detached phase ends. Never rejects. */
  completion: Promise<RefreshOutcome>;
};

export type RefreshOrchestratorDeps = {
  repository: CountryRepository;
  sources: RefreshSources;
  queue: TaskQueue;
  reportPath: string;
  reportFontPath?: string | null;
  random?: RandomSource;
  loadFlag?: FlagLoader;
  logger?: Logger;
  now?: () => Date;
  batchSize?: number;
};

type Snapshot = {
  countries: RawCountryRecord[];
  rates: RateTable;
};

export class RefreshOrchestrator {
  private readonly log: Logger;
  private readonly random: RandomSource;
  private readonly now: () => Date;
  private readonly reportGuard = new ReportGuard();

  constructor(private readonly deps: RefreshOrchestratorDeps) {
    this.log = deps.logger ?? defaultLogger;
    this.random = deps.random ?? defaultRandom;
    this.now = deps.now ?? (() => new Date());
  }

  /**
   * Fetches both sources in the caller's context, then hands the rest of the
   * cycle to the task queue. Rejects with `SourceUnavailableError` when a
   * source fails, before anything is written.
   */
  async trigger(): Promise<RefreshTicket> {
    const cycleId = randomUUID();
    const log = this.log.child({ cycleId });

    const countries = await this.precheck(log, () => this.deps.sources.countries.fetch());
    const rates = await this.precheck(log, () => this.deps.sources.exchangeRates.fetch());

    const acceptedAt = this.now();
    log.info({ countries: countries.length, rates: Object.keys(rates).length }, 'refresh accepted');

    const completion = this.deps.queue.submit(() =>
      this.execute(cycleId, { countries, rates }, log)
    );
    return { cycleId, acceptedAt, completion };
  }

  /** Re-renders the summary from stored data without refreshing. */
  async regenerateReport(): Promise<SummaryReport> {
    const last = await this.deps.repository.lastRefreshTime();
    return generateSummaryReport({
      repository: this.deps.repository,
      asOf: last ?? this.now(),
      outputPath: this.deps.reportPath,
      fontPath: this.deps.reportFontPath,
      loadFlag: this.deps.loadFlag,
      logger: this.log,
      guard: this.reportGuard,
    });
  }

  private async precheck<T>(log: Logger, fetch: () => Promise<T>): Promise<T> {
    try {
      return await fetch();
    } catch (err) {
      log.error({ err: describeError(err) }, 'refresh precheck failed');
      throw err;
    }
  }

  private async execute(cycleId: string, snapshot: Snapshot, log: Logger): Promise<RefreshOutcome> {
    const refreshedAt = this.now();
    const endTimer = startRefreshTimer();
    const fail = (stage: 'enrich' | 'persist', err: unknown): RefreshOutcome => {
      const error = err instanceof Error ? err : new Error(String(err));
      const details = err instanceof PersistenceError ? err.progress : undefined;
      log.error({ stage, err: error.message, ...details }, 'refresh cycle failed');
      refreshCycles.inc({ outcome: 'failed' });
      endTimer('failed');
      return { status: 'failed', cycleId, refreshedAt, stage, error };
    };

    let records: EnrichedCountry[];
    try {
      records = enrichAll(snapshot.countries, snapshot.rates, { refreshedAt, random: this.random });
    } catch (err) {
      return fail('enrich', err);
    }
    log.info({ records: records.length }, 'countries enriched');

    let persisted: PersistResult;
    try {
      persisted = await persistCountries(records, this.deps.repository, {
        batchSize: this.deps.batchSize,
        onChunk: ({ chunkIndex, chunkCount, affected }) =>
          log.debug({ chunkIndex, chunkCount, affected }, 'chunk upserted'),
      });
    } catch (err) {
      return fail('persist', err);
    }
    log.info({ affected: persisted.affected, chunks: persisted.chunks }, 'countries persisted');

    refreshCycles.inc({ outcome: 'succeeded' });
    setLastRefreshNow();
    endTimer('succeeded');

    let report: SummaryReport['status'] | 'failed';
    try {
      const result = await generateSummaryReport({
        repository: this.deps.repository,
        asOf: refreshedAt,
        outputPath: this.deps.reportPath,
        fontPath: this.deps.reportFontPath,
        loadFlag: this.deps.loadFlag,
        logger: log,
        guard: this.reportGuard,
      });
      report = result.status;
    } catch (err) {
      log.error({ err: describeError(err) }, 'summary image failed');
      report = 'failed';
    }

    return { status: 'succeeded', cycleId, refreshedAt, persisted, report };
  }
}
