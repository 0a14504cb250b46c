import { CountryInsertSchema, type Country, type EnrichedCountry } from '@countryfx/types';
import { toNameKey } from '../identity.js';
import { compareCountries } from './ordering.js';
import type { CountryFilter, CountryRepository } from './types.js';

/**
 * In-process store with the same semantics as the Postgres repository,
 * including the `last_refreshed_at` guard, row accounting (one affected
 * row per insert or applied update) and column constraints: a batch with one
 * record the table would refuse is rejected whole.
 */
export class MemoryCountryRepository implements CountryRepository {
  readonly kind = 'memory' as const;

  private readonly rows = new Map<string, Country>();
  private nextId = 1;

  async upsert(batch: EnrichedCountry[]): Promise<number> {
    for (const record of batch) CountryInsertSchema.parse(record);

    const now = new Date();
    let affected = 0;

    for (const record of batch) {
      const existing = this.rows.get(record.nameKey);
      if (!existing) {
        this.rows.set(record.nameKey, {
          id: this.nextId++,
          ...record,
          createdAt: now,
          updatedAt: now,
        });
        affected++;
        continue;
      }

      if (existing.lastRefreshedAt > record.lastRefreshedAt) continue;

      this.rows.set(record.nameKey, {
        ...existing,
        ...record,
        id: existing.id,
        createdAt: existing.createdAt,
        updatedAt: now,
      });
      affected++;
    }

    return affected;
  }

  async filter(filter: CountryFilter = {}): Promise<Country[]> {
    const region = filter.region?.toLowerCase();
    const currency = filter.currency?.toUpperCase();

    const matches = [...this.rows.values()].filter(
      (row) =>
        (region === undefined || row.region?.toLowerCase() === region) &&
        (currency === undefined || row.currencyCode?.toUpperCase() === currency)
    );
    matches.sort(compareCountries(filter.sort));

    return filter.limit === undefined ? matches : matches.slice(0, filter.limit);
  }

  async getByName(name: string): Promise<Country | null> {
    return this.rows.get(toNameKey(name)) ?? null;
  }

  async deleteByName(name: string): Promise<boolean> {
    return this.rows.delete(toNameKey(name));
  }

  async count(): Promise<number> {
    return this.rows.size;
  }

  async lastRefreshTime(): Promise<Date | null> {
    let latest: Date | null = null;
    for (const row of this.rows.values()) {
      if (!latest || row.lastRefreshedAt > latest) {
        latest = row.lastRefreshedAt;
      }
    }
    return latest;
  }

  async ping(): Promise<void> {}
}
