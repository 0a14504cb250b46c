import {
  bigint,
  index,
  numeric,
  pgTable,
  serial,
  text,
  uniqueIndex,
  varchar,
} from 'drizzle-orm/pg-core';
import { createdAtColumn, instantColumn, updatedAtColumn } from '../utils.js';

export const countriesTable = pgTable(
  'countries',
  {
    id: serial('id').primaryKey(),
    name: varchar('name', { length: 255 }).notNull(),
    // lower(trim(name)); the merge identity for refresh upserts
    nameKey: varchar('name_key', { length: 255 }).notNull(),
    capital: varchar('capital', { length: 255 }),
    region: varchar('region', { length: 100 }),
    population: bigint('population', { mode: 'number' }).notNull(),
    currencyCode: varchar('currency_code', { length: 10 }),
    exchangeRate: numeric('exchange_rate', { precision: 20, scale: 8 }),
    estimatedGdp: numeric('estimated_gdp', { precision: 30, scale: 2 }),
    flagUrl: text('flag_url'),
    lastRefreshedAt: instantColumn('last_refreshed_at'),
    createdAt: createdAtColumn(),
    updatedAt: updatedAtColumn(),
  },
  (t) => [
    uniqueIndex('countries_name_key_uq').on(t.nameKey),
    index('countries_region_idx').on(t.region),
    index('countries_currency_idx').on(t.currencyCode),
    index('countries_estimated_gdp_idx').on(t.estimatedGdp),
  ]
);
