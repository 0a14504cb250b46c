import { schema } from '@countryfx/db';
import { drizzle } from 'drizzle-orm/node-postgres';
import { describe, expect, it } from 'vitest';
import { enrichedCountry } from '../../../../test/fixtures/countries.js';
import { buildFilterQuery, buildUpsertQuery } from './postgres.js';

const db = drizzle.mock({ schema });

describe('buildUpsertQuery', () => {
  const { sql } = buildUpsertQuery(db, [enrichedCountry(), enrichedCountry({ name: 'Ghana' })]).toSQL();

  it('targets the name key', () => {
    expect(sql).toContain('insert into "countries"');
    expect(sql).toContain('on conflict ("name_key") do update set');
  });

  it('overwrites every non-key column from the incoming row', () => {
    for (const column of [
      'name',
      'capital',
      'region',
      'population',
      'currency_code',
      'exchange_rate',
      'estimated_gdp',
      'flag_url',
      'last_refreshed_at',
    ]) {
      expect(sql).toContain(`"${column}" = excluded.${column}`);
    }
    expect(sql).toContain('"updated_at" = now()');
  });

  it('never moves last_refreshed_at backwards', () => {
    expect(sql).toContain(
      'where "countries"."last_refreshed_at" <= excluded.last_refreshed_at'
    );
  });

  it('lets the store assign ids', () => {
    expect(sql).not.toContain('"id" =');
  });
});

describe('buildFilterQuery', () => {
  it('orders by name when unsorted and has no filters', () => {
    const { sql, params } = buildFilterQuery(db).toSQL();

    expect(sql).not.toContain(' where ');
    expect(sql).toContain('order by "countries"."name" asc');
    expect(params).toEqual([]);
  });

  it('puts unknown GDP last in both directions', () => {
    expect(buildFilterQuery(db, { sort: 'gdp_desc' }).toSQL().sql).toContain(
      'order by "countries"."estimated_gdp" desc nulls last, "countries"."name" asc'
    );
    expect(buildFilterQuery(db, { sort: 'gdp_asc' }).toSQL().sql).toContain(
      'order by "countries"."estimated_gdp" asc nulls last, "countries"."name" asc'
    );
  });

  it('matches region and currency case-insensitively and applies the limit', () => {
    const { sql, params } = buildFilterQuery(db, {
      region: 'Africa',
      currency: 'ngn',
      sort: 'gdp_desc',
      limit: 5,
    }).toSQL();

    expect(sql).toContain('lower("countries"."region") = $1');
    expect(sql).toContain('upper("countries"."currency_code") = $2');
    expect(sql).toContain('limit $3');
    expect(params).toEqual(['africa', 'NGN', 5]);
  });
});
