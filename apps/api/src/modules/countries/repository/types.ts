import type { Country, CountrySort, EnrichedCountry } from '@countryfx/types';
import type { CountryStoreKind } from '../../../lib/env.js';

export type CountryFilter = {
  region?: string;
  currency?: string;
  sort?: CountrySort;
  limit?: number;
};

/**
 * Storage port for the countries snapshot. Name lookups are case-insensitive.
 *
 * Ordering for `sort`: known GDP values first in the requested direction,
 * zero-sentinel rows compare as the number 0, unknown GDP always last, ties
 * broken by name ascending. Without `sort` rows come back by name.
 */
export interface CountryRepository {
  readonly kind: CountryStoreKind;
  /** One statement per call. Returns the store's affected-row count. */
  upsert(batch: EnrichedCountry[]): Promise<number>;
  filter(filter?: CountryFilter): Promise<Country[]>;
  getByName(name: string): Promise<Country | null>;
  deleteByName(name: string): Promise<boolean>;
  count(): Promise<number>;
  lastRefreshTime(): Promise<Date | null>;
  ping(): Promise<void>;
}
