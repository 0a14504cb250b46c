import type { ApiRuntimeEnv } from '../../../lib/env.js';
import { MemoryCountryRepository } from './memory.js';
import { PostgresCountryRepository } from './postgres.js';
import type { CountryRepository } from './types.js';

export type { CountryFilter, CountryRepository } from './types.js';
export { MemoryCountryRepository } from './memory.js';
export { PostgresCountryRepository } from './postgres.js';

export function createCountryRepository(env: Pick<ApiRuntimeEnv, 'store'>): CountryRepository {
  return env.store === 'memory' ? new MemoryCountryRepository() : new PostgresCountryRepository();
}
