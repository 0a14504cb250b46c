import type { ApiRuntimeEnv } from './lib/env.js';
import { logger as defaultLogger, type Logger } from './lib/logger.js';
import { resolveRandomSource, type RandomSource } from './lib/random.js';
import { TaskQueue } from './lib/task-queue.js';
import { createCountryRepository, type CountryRepository } from './modules/countries/repository/index.js';
import { RefreshOrchestrator } from './modules/countries/services/refresh-orchestrator.js';
import type { FlagLoader } from './modules/countries/services/report/summary-image.js';
import {
  createCountriesSource,
  createExchangeRatesSource,
  type RefreshSources,
} from './modules/countries/services/sources.js';

export type AppContext = {
  env: ApiRuntimeEnv;
  logger: Logger;
  repository: CountryRepository;
  queue: TaskQueue;
  orchestrator: RefreshOrchestrator;
};

export type AppContextOverrides = {
  repository?: CountryRepository;
  sources?: RefreshSources;
  random?: RandomSource;
  loadFlag?: FlagLoader;
  logger?: Logger;
  now?: () => Date;
};

export function createAppContext(env: ApiRuntimeEnv, overrides: AppContextOverrides = {}): AppContext {
  const logger = overrides.logger ?? defaultLogger;
  const repository = overrides.repository ?? createCountryRepository(env);
  const queue = new TaskQueue(env.refreshConcurrency);
  const sources = overrides.sources ?? {
    countries: createCountriesSource(env.countriesApiUrl, { timeoutMs: env.sourceTimeoutMs }),
    exchangeRates: createExchangeRatesSource(env.exchangeRatesApiUrl, {
      timeoutMs: env.sourceTimeoutMs,
    }),
  };

  const orchestrator = new RefreshOrchestrator({
    repository,
    sources,
    queue,
    reportPath: env.reportPath,
    reportFontPath: env.reportFontPath,
    random: overrides.random ?? resolveRandomSource(env.gdpRandomSeed),
    loadFlag: overrides.loadFlag,
    logger,
    now: overrides.now,
  });

  return { env, logger, repository, queue, orchestrator };
}
