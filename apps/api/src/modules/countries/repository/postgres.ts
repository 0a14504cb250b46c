import { countriesTable, db as defaultDb, type Database } from '@countryfx/db';
import type { Country, EnrichedCountry } from '@countryfx/types';
import { and, asc, count, eq, max, sql, type SQL } from 'drizzle-orm';
import { toNameKey } from '../identity.js';
import type { CountryFilter, CountryRepository } from './types.js';

/**
 * Insert or overwrite every non-key column, keyed by `name_key`. A row whose
 * stored `last_refreshed_at` is newer than the incoming one is left alone.
 */
export function buildUpsertQuery(database: Database, batch: EnrichedCountry[]) {
  return database
    .insert(countriesTable)
    .values(batch)
    .onConflictDoUpdate({
      target: countriesTable.nameKey,
      set: {
        name: sql`excluded.name`,
        capital: sql`excluded.capital`,
        region: sql`excluded.region`,
        population: sql`excluded.population`,
        currencyCode: sql`excluded.currency_code`,
        exchangeRate: sql`excluded.exchange_rate`,
        estimatedGdp: sql`excluded.estimated_gdp`,
        flagUrl: sql`excluded.flag_url`,
        lastRefreshedAt: sql`excluded.last_refreshed_at`,
        updatedAt: sql`now()`,
      },
      setWhere: sql`${countriesTable.lastRefreshedAt} <= excluded.last_refreshed_at`,
    });
}

function orderFor(sort: CountryFilter['sort']): SQL[] {
  const byName = asc(countriesTable.name);
  if (sort === 'gdp_desc') return [sql`${countriesTable.estimatedGdp} desc nulls last`, byName];
  if (sort === 'gdp_asc') return [sql`${countriesTable.estimatedGdp} asc nulls last`, byName];
  return [byName];
}

export function buildFilterQuery(database: Database, filter: CountryFilter = {}) {
  const conditions: SQL[] = [];
  if (filter.region) {
    conditions.push(sql`lower(${countriesTable.region}) = ${filter.region.toLowerCase()}`);
  }
  if (filter.currency) {
    conditions.push(sql`upper(${countriesTable.currencyCode}) = ${filter.currency.toUpperCase()}`);
  }

  const query = database
    .select()
    .from(countriesTable)
    .where(and(...conditions))
    .orderBy(...orderFor(filter.sort))
    .$dynamic();

  return filter.limit === undefined ? query : query.limit(filter.limit);
}

export class PostgresCountryRepository implements CountryRepository {
  readonly kind = 'postgres' as const;

  constructor(private readonly database: Database = defaultDb) {}

  async upsert(batch: EnrichedCountry[]): Promise<number> {
    if (batch.length === 0) return 0;
    const result = await buildUpsertQuery(this.database, batch);
    return result.rowCount ?? 0;
  }

  async filter(filter: CountryFilter = {}): Promise<Country[]> {
    return buildFilterQuery(this.database, filter);
  }

  async getByName(name: string): Promise<Country | null> {
    const [row] = await this.database
      .select()
      .from(countriesTable)
      .where(eq(countriesTable.nameKey, toNameKey(name)))
      .limit(1);
    return row ?? null;
  }

  async deleteByName(name: string): Promise<boolean> {
    const rows = await this.database
      .delete(countriesTable)
      .where(eq(countriesTable.nameKey, toNameKey(name)))
      .returning({ id: countriesTable.id });
    return rows.length > 0;
  }

  async count(): Promise<number> {
    const [row] = await this.database.select({ total: count() }).from(countriesTable);
    return row?.total ?? 0;
  }

  async lastRefreshTime(): Promise<Date | null> {
    const [row] = await this.database
      .select({ last: max(countriesTable.lastRefreshedAt) })
      .from(countriesTable);
    return row?.last ?? null;
  }

  async ping(): Promise<void> {
    await this.database.execute(sql`select 1`);
  }
}
